import { Entity, PrimaryGeneratedColumn, Column, CreateDateColumn } from 'typeorm';
import { FairPlayCards } from '../types/standings.types';

@Entity('games')
export class Game {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column({ type: 'text' })
  group!: string;

  @Column({ name: 'home_team' })
  homeTeam!: string;

  @Column({ name: 'away_team' })
  awayTeam!: string;

  @Column({ name: 'home_result', type: 'integer', nullable: true })
  homeResult!: number | null;

  @Column({ name: 'away_result', type: 'integer', nullable: true })
  awayResult!: number | null;

  @Column({ name: 'home_fair_play', type: 'jsonb', nullable: true })
  homeFairPlay!: FairPlayCards | null;

  @Column({ name: 'away_fair_play', type: 'jsonb', nullable: true })
  awayFairPlay!: FairPlayCards | null;

  @Column({ default: false })
  played!: boolean;

  @Column({ type: 'timestamptz' })
  kickoff!: Date;

  @CreateDateColumn({ name: 'created_at' })
  createdAt!: Date;
}
