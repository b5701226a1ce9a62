import { Transform, Type } from 'class-transformer';
import {
  IsEnum,
  IsIn,
  IsInt,
  IsOptional,
  IsString,
  Max,
  Min,
} from 'class-validator';
import { RoomType } from '../entities/room-type.enum';
import { toIdList } from '../../common/validation/transforms';

export const BOOKING_SORT_FIELDS = [
  'id',
  'name',
  'room_type',
  'room_number',
  'booking_start_date',
  'booking_end_date',
  'cost',
  'created_at',
  'updated_at',
] as const;

export type BookingSortField = (typeof BOOKING_SORT_FIELDS)[number];

const ORDER_BY_VALUES = BOOKING_SORT_FIELDS.flatMap((f) => [f, `-${f}`]);

export const DEFAULT_TAKE = 50;

export class QueryBookingsDto {
  @Type(() => Number)
  @IsInt()
  @IsOptional()
  id?: number;

  @Transform(({ value }) => toIdList(value).map(Number))
  @IsInt({ each: true })
  @IsOptional()
  ids?: number[];

  @IsEnum(RoomType)
  @IsOptional()
  room_type?: RoomType;

  @IsString()
  @IsOptional()
  name_contains?: string;

  @Type(() => Number)
  @IsInt()
  @Min(0)
  @IsOptional()
  skip?: number;

  @Type(() => Number)
  @IsInt()
  @Min(1)
  @Max(100)
  @IsOptional()
  take?: number;

  @IsIn(ORDER_BY_VALUES)
  @IsOptional()
  order_by?: string;
}
