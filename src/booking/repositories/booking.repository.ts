import { Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { Booking } from '../entities/booking.entity';
import { RoomType } from '../entities/room-type.enum';
import { BookingSortField } from '../dto/query-bookings.dto';

export interface BookingFilter {
  id?: number;
  ids?: number[];
  room_type?: RoomType;
  name_contains?: string;
}

export interface BookingPage {
  skip: number;
  take: number;
  order_by: BookingSortField;
  descending: boolean;
}

export type NewBooking = Pick<
  Booking,
  | 'name'
  | 'room_type'
  | 'room_number'
  | 'booking_start_date'
  | 'booking_end_date'
  | 'cost'
  | 'notes'
  | 'owner_id'
  | 'created_by'
  | 'updated_by'
>;

@Injectable()
export class BookingRepository {
  constructor(
    @InjectRepository(Booking)
    private readonly bookingRepository: Repository<Booking>,
  ) {}

  /**
   * Returns one page of bookings matching the filter together with the
   * total match count. Soft-deleted rows are excluded.
   */
  async findMany(
    filter: BookingFilter,
    page: BookingPage,
  ): Promise<[Booking[], number]> {
    const query = this.bookingRepository
      .createQueryBuilder('booking')
      .where('booking.deleted_at IS NULL');

    if (filter.id !== undefined) {
      query.andWhere('booking.id = :id', { id: filter.id });
    }

    if (filter.ids && filter.ids.length > 0) {
      query.andWhere('booking.id IN (:...ids)', { ids: filter.ids });
    }

    if (filter.room_type) {
      query.andWhere('booking.room_type = :roomType', {
        roomType: filter.room_type,
      });
    }

    if (filter.name_contains) {
      query.andWhere('LOWER(booking.name) LIKE :name', {
        name: `%${escapeLike(filter.name_contains).toLowerCase()}%`,
      });
    }

    return await query
      .orderBy(`booking.${page.order_by}`, page.descending ? 'DESC' : 'ASC')
      .skip(page.skip)
      .take(page.take)
      .getManyAndCount();
  }

  async findById(id: number): Promise<Booking | null> {
    return await this.bookingRepository.findOne({ where: { id } });
  }

  async createBooking(booking: NewBooking): Promise<Booking> {
    const entity = this.bookingRepository.create({
      ...booking,
      cancelled: false,
    });
    return await this.bookingRepository.save(entity);
  }

  async saveBooking(booking: Booking): Promise<Booking> {
    return await this.bookingRepository.save(booking);
  }

  async softDeleteBooking(id: number, deletedBy: string): Promise<void> {
    await this.bookingRepository.update(id, {
      deleted_by: deletedBy,
      deleted_at: new Date(),
    });
  }
}

function escapeLike(value: string): string {
  return value.replace(/[\\%_]/g, (c) => `\\${c}`);
}
