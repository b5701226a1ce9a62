import {
  IsString,
  IsNotEmpty,
  IsDateString,
  IsOptional,
  IsEnum,
  IsInt,
  IsNumber,
  IsPositive,
  IsBoolean,
} from 'class-validator';
import { RoomType } from '../entities/room-type.enum';

export class UpdateBookingDto {
  @IsString()
  @IsNotEmpty()
  @IsOptional()
  name?: string;

  @IsEnum(RoomType)
  @IsOptional()
  room_type?: RoomType;

  @IsInt()
  @IsPositive()
  @IsOptional()
  room_number?: number;

  @IsDateString({ strict: true })
  @IsOptional()
  booking_start_date?: string;

  // null clears the end date; IsOptional lets it through
  @IsDateString({ strict: true })
  @IsOptional()
  booking_end_date?: string | null;

  @IsNumber({ maxDecimalPlaces: 2 })
  @IsPositive()
  @IsOptional()
  cost?: number;

  @IsString()
  @IsOptional()
  notes?: string;

  @IsBoolean()
  @IsOptional()
  cancelled?: boolean;
}
