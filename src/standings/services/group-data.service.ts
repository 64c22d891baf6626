import { Injectable, NotFoundException } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { IsNull, Not, Repository } from 'typeorm';
import { Group } from '../domain/group';
import { Game } from '../entities/game.entity';
import { Team } from '../entities/team.entity';
import { mapRowsToGroup } from '../mappers/group.mapper';
import { TeamId } from '../types/standings.types';

/**
 * Service for loading stored groups
 * Builds validated domain groups from the teams and games tables
 */
@Injectable()
export class GroupDataService {
  constructor(
    @InjectRepository(Team)
    private teamRepository: Repository<Team>,
    @InjectRepository(Game)
    private gameRepository: Repository<Game>,
  ) {}

  /**
   * Loads one group with its played and scheduled games
   * @param name - Group name (e.g., 'A')
   */
  async loadGroup(name: string): Promise<Group> {
    const teams = await this.teamRepository.find({
      where: { group: name },
      order: { name: 'ASC' },
    });

    if (teams.length === 0) {
      throw new NotFoundException(`Group ${name} not found`);
    }

    const games = await this.gameRepository.find({
      where: { group: name },
      order: { kickoff: 'ASC' },
    });

    return mapRowsToGroup(teams, games);
  }

  /**
   * Loads every group
   * @returns Map of group names to groups, sorted by name
   */
  async loadGroups(): Promise<Map<string, Group>> {
    const teams = await this.teamRepository.find({
      where: { group: Not(IsNull()) },
      order: { group: 'ASC', name: 'ASC' },
    });
    const games = await this.gameRepository.find({ order: { kickoff: 'ASC' } });

    const teamsByGroup = new Map<string, Team[]>();
    for (const team of teams) {
      if (team.group === null) continue;
      const members = teamsByGroup.get(team.group) ?? [];
      members.push(team);
      teamsByGroup.set(team.group, members);
    }

    const groups = new Map<string, Group>();
    for (const [name, members] of teamsByGroup) {
      groups.set(
        name,
        mapRowsToGroup(
          members,
          games.filter((game) => game.group === name),
        ),
      );
    }
    return groups;
  }

  /**
   * External ranking of every stored team, lower is better
   */
  async getTeamRanking(): Promise<Map<TeamId, number>> {
    const teams = await this.teamRepository.find({ select: { id: true, rank: true } });
    return new Map(teams.map((team) => [team.id, team.rank]));
  }
}
