import { Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { TypeOrmModule } from '@nestjs/typeorm';
import configuration from './config/configuration';
import { StandingsModule } from './standings/standings.module';
import { CommonModule } from './common/common.module';
import { Team } from './standings/entities/team.entity';
import { Game } from './standings/entities/game.entity';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      load: [configuration],
    }),
    TypeOrmModule.forRootAsync({
      imports: [ConfigModule],
      useFactory: (configService: ConfigService) => ({
        type: 'postgres',
        host: configService.get<string>('database.host'),
        port: configService.get<number>('database.port'),
        username: configService.get<string>('database.username'),
        password: configService.get<string>('database.password'),
        database: configService.get<string>('database.database'),
        entities: [Team, Game],
        synchronize: false, // Schema is managed by migrations
        logging: configService.get<string>('nodeEnv') === 'development',
        extra: {
          max: configService.get<number>('database.poolSize'),
          connectionTimeoutMillis: configService.get<number>('database.connectionTimeoutMillis'),
        },
      }),
      inject: [ConfigService],
    }),
    CommonModule,
    StandingsModule,
  ],
})
export class AppModule {}
