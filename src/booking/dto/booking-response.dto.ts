import { RoomType } from '../entities/room-type.enum';

export interface BookingResponseDto {
  id: number;
  name: string;
  room_type: RoomType;
  room_number: number;
  booking_start_date: string;
  booking_end_date?: string;
  cost: number;
  notes?: string;
  cancelled: boolean;
  owner_id?: string;
  created_at: string;
  created_by: string;
  updated_at: string;
  updated_by: string;
}

export interface DeleteBookingResponseDto {
  id: number;
}
