import {
  IsString,
  IsNotEmpty,
  IsDateString,
  IsOptional,
  IsEnum,
  IsInt,
  IsNumber,
  IsPositive,
} from 'class-validator';
import { RoomType } from '../entities/room-type.enum';

export class CreateBookingDto {
  @IsString()
  @IsNotEmpty()
  name!: string;

  @IsEnum(RoomType)
  room_type!: RoomType;

  @IsInt()
  @IsPositive()
  room_number!: number;

  @IsDateString({ strict: true })
  booking_start_date!: string;

  @IsDateString({ strict: true })
  @IsOptional()
  booking_end_date?: string;

  @IsNumber({ maxDecimalPlaces: 2 })
  @IsPositive()
  cost!: number;

  @IsString()
  @IsOptional()
  notes?: string;
}
