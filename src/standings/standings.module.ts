import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { GroupOrderService } from './group-order.service';
import { RuleSetRegistry } from './rule-set.registry';
import { StandingsService } from './standings.service';
import { GroupDataService } from './services/group-data.service';
import { Team } from './entities/team.entity';
import { Game } from './entities/game.entity';

@Module({
  imports: [TypeOrmModule.forFeature([Team, Game])],
  providers: [GroupOrderService, RuleSetRegistry, StandingsService, GroupDataService],
  exports: [GroupOrderService, RuleSetRegistry, StandingsService, GroupDataService],
})
export class StandingsModule {}
