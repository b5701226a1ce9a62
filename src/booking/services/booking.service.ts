import { Injectable, NotFoundException, Logger } from '@nestjs/common';
import { AuthUser } from '../../auth/auth-user';
import { QueryResponse } from '../../common/dto/query-response.dto';
import { ValidationFailedException } from '../../common/validation/validation-failed.exception';
import { Booking } from '../entities/booking.entity';
import { CreateBookingDto } from '../dto/create-booking.dto';
import { UpdateBookingDto } from '../dto/update-booking.dto';
import {
  BOOKING_SORT_FIELDS,
  BookingSortField,
  DEFAULT_TAKE,
  QueryBookingsDto,
} from '../dto/query-bookings.dto';
import {
  BookingResponseDto,
  DeleteBookingResponseDto,
} from '../dto/booking-response.dto';
import { BookingRepository } from '../repositories/booking.repository';

@Injectable()
export class BookingService {
  private readonly logger = new Logger(BookingService.name);

  constructor(private readonly bookingRepository: BookingRepository) {}

  /**
   * Query bookings with optional filters, paging and ordering
   */
  async queryBookings(
    query: QueryBookingsDto,
  ): Promise<QueryResponse<BookingResponseDto>> {
    const skip = query.skip ?? 0;
    const { field, descending } = parseOrderBy(query.order_by);

    const [bookings, total] = await this.bookingRepository.findMany(
      {
        id: query.id,
        ids: query.ids,
        room_type: query.room_type,
        name_contains: query.name_contains,
      },
      {
        skip,
        take: query.take ?? DEFAULT_TAKE,
        order_by: field,
        descending,
      },
    );

    return new QueryResponse(skip, total, bookings.map(toBookingResponse));
  }

  async getBooking(id: number): Promise<BookingResponseDto> {
    return toBookingResponse(await this.findActiveBooking(id));
  }

  /**
   * Create a booking owned by the calling user
   */
  async createBooking(
    dto: CreateBookingDto,
    user: AuthUser,
  ): Promise<BookingResponseDto> {
    const startDate = new Date(dto.booking_start_date);
    const endDate = dto.booking_end_date ? new Date(dto.booking_end_date) : null;

    assertDateRange(startDate, endDate);

    const booking = await this.bookingRepository.createBooking({
      name: dto.name,
      room_type: dto.room_type,
      room_number: dto.room_number,
      booking_start_date: startDate,
      booking_end_date: endDate,
      cost: dto.cost,
      notes: dto.notes ?? null,
      owner_id: user.id,
      created_by: user.email,
      updated_by: user.email,
    });

    this.logger.log(`Booking ${booking.id} created by ${user.email}`);

    return toBookingResponse(booking);
  }

  /**
   * Apply a partial update; fields absent from the dto are left as they are
   */
  async updateBooking(
    id: number,
    dto: UpdateBookingDto,
    user: AuthUser,
  ): Promise<BookingResponseDto> {
    const booking = await this.findActiveBooking(id);

    if (dto.name !== undefined) booking.name = dto.name;
    if (dto.room_type !== undefined) booking.room_type = dto.room_type;
    if (dto.room_number !== undefined) booking.room_number = dto.room_number;
    if (dto.cost !== undefined) booking.cost = dto.cost;
    if (dto.notes !== undefined) booking.notes = dto.notes;
    if (dto.cancelled !== undefined) booking.cancelled = dto.cancelled;
    if (dto.booking_start_date !== undefined) {
      booking.booking_start_date = new Date(dto.booking_start_date);
    }
    if (dto.booking_end_date !== undefined) {
      booking.booking_end_date =
        dto.booking_end_date === null ? null : new Date(dto.booking_end_date);
    }

    assertDateRange(booking.booking_start_date, booking.booking_end_date);

    booking.updated_by = user.email;
    const saved = await this.bookingRepository.saveBooking(booking);

    this.logger.log(`Booking ${id} updated by ${user.email}`);

    return toBookingResponse(saved);
  }

  /**
   * Soft delete: the row stays with deleted_at/deleted_by set
   */
  async deleteBooking(
    id: number,
    user: AuthUser,
  ): Promise<DeleteBookingResponseDto> {
    await this.findActiveBooking(id);
    await this.bookingRepository.softDeleteBooking(id, user.email);

    this.logger.log(`Booking ${id} deleted by ${user.email}`);

    return { id };
  }

  private async findActiveBooking(id: number): Promise<Booking> {
    const booking = await this.bookingRepository.findById(id);
    if (!booking || booking.deleted_at) {
      throw new NotFoundException(`Booking ${id} not found`);
    }
    return booking;
  }
}

export function parseOrderBy(orderBy?: string): {
  field: BookingSortField;
  descending: boolean;
} {
  if (!orderBy) {
    return { field: 'id', descending: false };
  }
  const descending = orderBy.startsWith('-');
  const field = descending ? orderBy.slice(1) : orderBy;
  return { field: isSortField(field) ? field : 'id', descending };
}

function isSortField(field: string): field is BookingSortField {
  return BOOKING_SORT_FIELDS.some((f) => f === field);
}

function assertDateRange(startDate: Date, endDate: Date | null): void {
  if (isNaN(startDate.getTime())) {
    throw new ValidationFailedException([
      {
        field_name: 'booking_start_date',
        error_code: 'DateString',
        message: 'Invalid booking_start_date',
      },
    ]);
  }
  if (endDate && endDate < startDate) {
    throw new ValidationFailedException([
      {
        field_name: 'booking_end_date',
        error_code: 'DateRange',
        message: 'booking_end_date must not be before booking_start_date',
      },
    ]);
  }
}

export function toBookingResponse(booking: Booking): BookingResponseDto {
  return {
    id: booking.id,
    name: booking.name,
    room_type: booking.room_type,
    room_number: booking.room_number,
    booking_start_date: booking.booking_start_date.toISOString(),
    booking_end_date: booking.booking_end_date?.toISOString(),
    cost: booking.cost,
    notes: booking.notes ?? undefined,
    cancelled: booking.cancelled,
    owner_id: booking.owner_id ?? undefined,
    created_at: booking.created_at.toISOString(),
    created_by: booking.created_by,
    updated_at: booking.updated_at.toISOString(),
    updated_by: booking.updated_by,
  };
}
