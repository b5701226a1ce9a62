import React, { useCallback, useEffect, useState } from 'react';
import type { BookingResponseDto } from '../../../src/booking/dto/booking-response.dto';
import { RoomType } from '../../../src/booking/entities/room-type.enum';
import { Role } from '../../../src/auth/role.enum';
import type { ApiClient } from '../api/client';
import { hasRole, Session } from '../auth/session';
import { errorMessage } from '../components/errors';
import FieldError from '../components/FieldError';

export type BookingsApi = Pick<
  ApiClient,
  'queryBookings' | 'createBooking' | 'updateBooking' | 'deleteBooking'
>;

interface BookingForm {
  name: string;
  room_type: RoomType;
  room_number: string;
  booking_start_date: string;
  booking_end_date: string;
  cost: string;
  notes: string;
}

const EMPTY_FORM: BookingForm = {
  name: '',
  room_type: RoomType.Single,
  room_number: '',
  booking_start_date: '',
  booking_end_date: '',
  cost: '',
  notes: '',
};

const ROOM_TYPES = Object.values(RoomType);

export const PAGE_SIZE = 20;

function isRoomType(value: string): value is RoomType {
  return ROOM_TYPES.some((t) => t === value);
}

// <input type="date"> values are yyyy-mm-dd
function toIsoDate(value: string): string {
  return new Date(`${value}T00:00:00.000Z`).toISOString();
}

function formatDate(value?: string): string {
  return value ? value.slice(0, 10) : '';
}

interface BookingsPageProps {
  client: BookingsApi;
  session: Session;
}

const BookingsPage: React.FC<BookingsPageProps> = ({ client, session }) => {
  const [bookings, setBookings] = useState<BookingResponseDto[]>([]);
  const [total, setTotal] = useState(0);
  const [skip, setSkip] = useState(0);
  const [form, setForm] = useState<BookingForm>(EMPTY_FORM);
  const [formError, setFormError] = useState<unknown>(null);
  const [error, setError] = useState<string | null>(null);

  const canEdit = hasRole(session, Role.Employee);
  const canDelete = hasRole(session, Role.Manager);
  const pageCount = Math.max(1, Math.ceil(total / PAGE_SIZE));
  const pageNumber = Math.floor(skip / PAGE_SIZE) + 1;

  const load = useCallback(async () => {
    try {
      const response = await client.queryBookings({
        order_by: '-booking_start_date',
        skip,
        take: PAGE_SIZE,
      });
      setBookings(response.results);
      setTotal(response.total);
    } catch (err) {
      setError(errorMessage(err));
    }
  }, [client, skip]);

  useEffect(() => {
    void load();
  }, [load]);

  const updateField = (field: Exclude<keyof BookingForm, 'room_type'>) =>
    (event: React.ChangeEvent<HTMLInputElement | HTMLTextAreaElement>) => {
      const { value } = event.target;
      setForm((current) => ({ ...current, [field]: value }));
    };

  const handleRoomTypeChange = (event: React.ChangeEvent<HTMLSelectElement>) => {
    const { value } = event.target;
    if (isRoomType(value)) {
      setForm((current) => ({ ...current, room_type: value }));
    }
  };

  const handleCreate = async (event: React.FormEvent) => {
    event.preventDefault();
    setFormError(null);
    try {
      await client.createBooking({
        name: form.name,
        room_type: form.room_type,
        room_number: Number(form.room_number),
        booking_start_date: form.booking_start_date ? toIsoDate(form.booking_start_date) : '',
        booking_end_date: form.booking_end_date ? toIsoDate(form.booking_end_date) : undefined,
        cost: Number(form.cost),
        notes: form.notes || undefined,
      });
      setForm(EMPTY_FORM);
      await load();
    } catch (err) {
      setFormError(err);
    }
  };

  const handleToggleCancelled = async (booking: BookingResponseDto) => {
    setError(null);
    try {
      const updated = await client.updateBooking(booking.id, { cancelled: !booking.cancelled });
      setBookings((current) => current.map((b) => (b.id === updated.id ? updated : b)));
    } catch (err) {
      setError(errorMessage(err));
    }
  };

  const handleDelete = async (booking: BookingResponseDto) => {
    setError(null);
    try {
      await client.deleteBooking(booking.id);
      setBookings((current) => current.filter((b) => b.id !== booking.id));
      setTotal((current) => current - 1);
    } catch (err) {
      setError(errorMessage(err));
    }
  };

  return (
    <section className="bookings">
      <h1>Bookings</h1>
      <p>{total === 1 ? '1 booking' : `${total} bookings`}</p>

      {error && <p role="alert" className="error">{error}</p>}

      <table>
        <thead>
          <tr>
            <th>Name</th>
            <th>Room</th>
            <th>Start</th>
            <th>End</th>
            <th>Cost</th>
            <th>Status</th>
            <th />
          </tr>
        </thead>
        <tbody>
          {bookings.map((booking) => (
            <tr key={booking.id}>
              <td>{booking.name}</td>
              <td>{`${booking.room_type} #${booking.room_number}`}</td>
              <td>{formatDate(booking.booking_start_date)}</td>
              <td>{formatDate(booking.booking_end_date)}</td>
              <td>{booking.cost.toFixed(2)}</td>
              <td>{booking.cancelled ? 'Cancelled' : 'Active'}</td>
              <td>
                {canEdit && (
                  <button type="button" onClick={() => void handleToggleCancelled(booking)}>
                    {booking.cancelled ? 'Restore' : 'Cancel'}
                  </button>
                )}
                {canDelete && (
                  <button
                    type="button"
                    aria-label={`Delete ${booking.name}`}
                    onClick={() => void handleDelete(booking)}
                  >
                    Delete
                  </button>
                )}
              </td>
            </tr>
          ))}
        </tbody>
      </table>

      <div className="pager">
        <button
          type="button"
          disabled={skip === 0}
          onClick={() => setSkip((current) => Math.max(0, current - PAGE_SIZE))}
        >
          Previous
        </button>
        <span>{`Page ${pageNumber} of ${pageCount}`}</span>
        <button
          type="button"
          disabled={skip + PAGE_SIZE >= total}
          onClick={() => setSkip((current) => current + PAGE_SIZE)}
        >
          Next
        </button>
      </div>

      {canEdit && (
        <form aria-label="New booking" onSubmit={(e) => void handleCreate(e)}>
          <h2>New booking</h2>
          <label>
            Name
            <input value={form.name} onChange={updateField('name')} />
            <FieldError error={formError} field="name" />
          </label>
          <label>
            Room type
            <select value={form.room_type} onChange={handleRoomTypeChange}>
              {ROOM_TYPES.map((type) => (
                <option key={type} value={type}>
                  {type}
                </option>
              ))}
            </select>
          </label>
          <label>
            Room number
            <input type="number" value={form.room_number} onChange={updateField('room_number')} />
            <FieldError error={formError} field="room_number" />
          </label>
          <label>
            Start date
            <input type="date" value={form.booking_start_date} onChange={updateField('booking_start_date')} />
            <FieldError error={formError} field="booking_start_date" />
          </label>
          <label>
            End date
            <input type="date" value={form.booking_end_date} onChange={updateField('booking_end_date')} />
            <FieldError error={formError} field="booking_end_date" />
          </label>
          <label>
            Cost
            <input type="number" step="0.01" value={form.cost} onChange={updateField('cost')} />
            <FieldError error={formError} field="cost" />
          </label>
          <label>
            Notes
            <textarea value={form.notes} onChange={updateField('notes')} />
          </label>
          {formError !== null && <p role="alert" className="error">{errorMessage(formError)}</p>}
          <button type="submit">Create booking</button>
        </form>
      )}
    </section>
  );
};

export default BookingsPage;
