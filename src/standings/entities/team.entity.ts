import { Entity, PrimaryGeneratedColumn, Column, CreateDateColumn } from 'typeorm';

@Entity('teams')
export class Team {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column()
  name!: string;

  @Column({ name: 'fifa_code', length: 3 })
  fifaCode!: string;

  @Column({ length: 2 })
  iso2!: string;

  // External ranking used as the last tiebreaker, lower is better
  @Column()
  rank!: number;

  @Column({ type: 'text', nullable: true })
  group!: string | null;

  @CreateDateColumn({ name: 'created_at' })
  createdAt!: Date;
}
