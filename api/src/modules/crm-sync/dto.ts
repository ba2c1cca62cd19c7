import { ApiPropertyOptional } from '@nestjs/swagger';
import { Transform } from 'class-transformer';
import { IsBoolean, IsIn, IsInt, IsOptional, Max, Min } from 'class-validator';
import {
  toLowerTrimmed,
  toOptionalBoolean,
  toOptionalInt,
} from '../../shared/common/transform.util';
import { SYNC_STATES, type SyncState } from './sync.types';

export class RunSyncQueryDto {
  @ApiPropertyOptional({ description: 'Skip the sync interval check' })
  @IsOptional()
  @Transform(toOptionalBoolean)
  @IsBoolean()
  force?: boolean;
}

export class ListSyncRecordsQueryDto {
  @ApiPropertyOptional({ enum: [...SYNC_STATES], default: 'dead' })
  @IsOptional()
  @Transform(toLowerTrimmed)
  @IsIn(SYNC_STATES)
  state?: SyncState;

  @ApiPropertyOptional({ minimum: 1, maximum: 500, default: 50 })
  @IsOptional()
  @Transform(toOptionalInt)
  @IsInt()
  @Min(1)
  @Max(500)
  limit?: number;
}

export class SyncStatsQueryDto {
  @ApiPropertyOptional({ minimum: 1, maximum: 365, default: 30 })
  @IsOptional()
  @Transform(toOptionalInt)
  @IsInt()
  @Min(1)
  @Max(365)
  days?: number;
}
