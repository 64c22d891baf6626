import { BadRequestException } from '@nestjs/common';
import { plainToInstance, Type } from 'class-transformer';
import {
  ArrayMinSize,
  IsArray,
  IsDate,
  IsDefined,
  IsInt,
  IsNotEmpty,
  IsOptional,
  IsString,
  Min,
  ValidateNested,
  ValidationError,
  validateSync,
} from 'class-validator';
import { Group } from '../domain/group';

export class FairPlayCardsDto {
  @IsInt()
  @Min(0)
  yellow!: number;

  @IsInt()
  @Min(0)
  indirectRed!: number;

  @IsInt()
  @Min(0)
  directRed!: number;

  @IsInt()
  @Min(0)
  yellowDirectRed!: number;
}

export class ScoreDto {
  @IsInt()
  @Min(0)
  home!: number;

  @IsInt()
  @Min(0)
  away!: number;
}

export class FairPlayScoreDto {
  @ValidateNested()
  @Type(() => FairPlayCardsDto)
  home!: FairPlayCardsDto;

  @ValidateNested()
  @Type(() => FairPlayCardsDto)
  away!: FairPlayCardsDto;
}

export class UnplayedGameDto {
  @IsString()
  @IsNotEmpty()
  id!: string;

  @IsString()
  @IsNotEmpty()
  home!: string;

  @IsString()
  @IsNotEmpty()
  away!: string;

  // RFC 3339 timestamps, e.g. 2018-06-14T18:00:00+03:00
  @Type(() => Date)
  @IsDate()
  date!: Date;
}

export class PlayedGameDto extends UnplayedGameDto {
  @IsDefined()
  @ValidateNested()
  @Type(() => ScoreDto)
  score!: ScoreDto;

  @IsOptional()
  @ValidateNested()
  @Type(() => FairPlayScoreDto)
  fairPlay?: FairPlayScoreDto;
}

export class GroupDto {
  @IsOptional()
  @IsArray()
  @ArrayMinSize(1)
  @IsString({ each: true })
  teams?: string[];

  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => PlayedGameDto)
  playedGames!: PlayedGameDto[];

  @IsOptional()
  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => UnplayedGameDto)
  unplayedGames?: UnplayedGameDto[];
}

function flattenErrors(errors: ValidationError[], path = ''): string[] {
  return errors.flatMap((error) => {
    const property = path ? `${path}.${error.property}` : error.property;
    const own = Object.values(error.constraints ?? {}).map((message) =>
      message.replace(error.property, property),
    );
    return [...own, ...flattenErrors(error.children ?? [], property)];
  });
}

/**
 * Validates plain group data (e.g. parsed JSON) and builds a group from it
 * @throws BadRequestException listing every failed constraint
 */
export function parseGroupDto(plain: object): Group {
  const dto = plainToInstance(GroupDto, plain);
  const errors = validateSync(dto, { forbidUnknownValues: true });

  if (errors.length > 0) {
    throw new BadRequestException(flattenErrors(errors));
  }

  return Group.create({
    teams: dto.teams,
    playedGames: dto.playedGames,
    unplayedGames: dto.unplayedGames,
  });
}
