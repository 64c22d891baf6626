import { DataSource } from 'typeorm';
import { config } from 'dotenv';
import configuration from './configuration';
import { Team } from '../standings/entities/team.entity';
import { Game } from '../standings/entities/game.entity';
import { InitialSchema1730000000001 } from '../database/migrations/1730000000001-InitialSchema';

config();

const appConfig = configuration();

export default new DataSource({
  type: 'postgres',
  host: appConfig.database.host,
  port: appConfig.database.port,
  username: appConfig.database.username,
  password: appConfig.database.password,
  database: appConfig.database.database,
  entities: [Team, Game],
  migrations: [InitialSchema1730000000001],
  synchronize: false,
  logging: appConfig.nodeEnv === 'development',
});
