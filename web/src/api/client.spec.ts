import { RoomType } from '../../../src/booking/entities/room-type.enum';
import { ApiClient, ApiError, FetchResponse, toQueryString } from './client';

describe('ApiClient', () => {
  const jsonResponse = (status: number, body: unknown, statusText = ''): FetchResponse => ({
    ok: status >= 200 && status < 300,
    status,
    statusText,
    json: async () => body,
  });

  const fetchFn = jest.fn();

  const createClient = (bearerToken?: string) =>
    new ApiClient({ baseUrl: 'http://localhost:3000/', bearerToken, fetchFn });

  afterEach(() => {
    jest.clearAllMocks();
  });

  it('should call hello and return the parsed body', async () => {
    fetchFn.mockResolvedValue(jsonResponse(200, { result: 'Hello, World!' }));

    const response = await createClient().hello('World');

    expect(response).toEqual({ result: 'Hello, World!' });
    expect(fetchFn).toHaveBeenCalledWith('http://localhost:3000/hello/World', {
      method: 'GET',
      headers: { Accept: 'application/json' },
      body: undefined,
    });
  });

  it('should send JSON bodies with the bearer token', async () => {
    fetchFn.mockResolvedValue(jsonResponse(201, { id: 1 }));

    await createClient('test-token').createBooking({
      name: 'Booking 2',
      room_type: RoomType.Double,
      room_number: 12,
      booking_start_date: '2025-03-01T00:00:00.000Z',
      cost: 80,
    });

    expect(fetchFn).toHaveBeenCalledWith('http://localhost:3000/bookings', {
      method: 'POST',
      headers: {
        Accept: 'application/json',
        'Content-Type': 'application/json',
        Authorization: 'Bearer test-token',
      },
      body: JSON.stringify({
        name: 'Booking 2',
        room_type: 'Double',
        room_number: 12,
        booking_start_date: '2025-03-01T00:00:00.000Z',
        cost: 80,
      }),
    });
  });

  it('should pick up a token set after construction', async () => {
    fetchFn.mockResolvedValue(jsonResponse(200, { offset: 0, total: 0, results: [] }));
    const client = createClient();

    client.setBearerToken('test-token');
    await client.queryBookings({ take: 10, order_by: '-cost' });

    const [url, init] = fetchFn.mock.calls[0];
    expect(url).toBe('http://localhost:3000/bookings?take=10&order_by=-cost');
    expect(init.headers.Authorization).toBe('Bearer test-token');
  });

  it('should use PATCH for booking updates and DELETE for removals', async () => {
    fetchFn.mockResolvedValue(jsonResponse(200, { id: 4 }));
    const client = createClient('test-token');

    await client.updateBooking(4, { cancelled: true });
    await client.deleteBooking(4);

    expect(fetchFn.mock.calls[0][0]).toBe('http://localhost:3000/booking/4');
    expect(fetchFn.mock.calls[0][1].method).toBe('PATCH');
    expect(fetchFn.mock.calls[1][0]).toBe('http://localhost:3000/booking/4');
    expect(fetchFn.mock.calls[1][1].method).toBe('DELETE');
  });

  it('should not read a body from a 204 delete', async () => {
    const json = jest.fn();
    fetchFn.mockResolvedValue({ ok: true, status: 204, statusText: 'No Content', json });

    await createClient().deleteTodos(['a', 'b']);

    expect(fetchFn.mock.calls[0][0]).toBe('http://localhost:3000/todos?ids=a%2Cb');
    expect(json).not.toHaveBeenCalled();
  });

  it('should raise an ApiError with field errors', async () => {
    fetchFn.mockResolvedValue(
      jsonResponse(400, {
        status_code: 400,
        error_code: 'ValidationFailed',
        message: 'text should not be empty',
        errors: [
          { field_name: 'text', error_code: 'NotEmpty', message: 'text should not be empty' },
        ],
      }),
    );

    const error = await createClient()
      .createTodo({ text: '' })
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ApiError);
    if (error instanceof ApiError) {
      expect(error.status).toBe(400);
      expect(error.errorCode).toBe('ValidationFailed');
      expect(error.message).toBe('text should not be empty');
      expect(error.fieldError('text')).toBe('text should not be empty');
      expect(error.fieldError('other')).toBeUndefined();
    }
  });

  it('should fall back to the status text for non-API errors', async () => {
    fetchFn.mockResolvedValue({
      ok: false,
      status: 502,
      statusText: 'Bad Gateway',
      json: async () => {
        throw new SyntaxError('Unexpected token <');
      },
    });

    await expect(createClient().hello('World')).rejects.toEqual(
      new ApiError(502, 'HttpError', 'Bad Gateway'),
    );
  });
});

describe('ApiClient unauthorized handler', () => {
  const unauthorized = (): FetchResponse => ({
    ok: false,
    status: 401,
    statusText: 'Unauthorized',
    json: async () => ({
      status_code: 401,
      error_code: 'Unauthorized',
      message: 'Invalid or expired token',
    }),
  });

  it('should run when a request with a token is rejected', async () => {
    const onUnauthorized = jest.fn();
    const client = new ApiClient({
      baseUrl: 'http://localhost:3000',
      bearerToken: 'test-token',
      fetchFn: async () => unauthorized(),
    });
    client.setUnauthorizedHandler(onUnauthorized);

    await expect(client.queryBookings()).rejects.toEqual(
      new ApiError(401, 'Unauthorized', 'Invalid or expired token'),
    );
    expect(onUnauthorized).toHaveBeenCalledTimes(1);
  });

  it('should not run for a failed sign in without a token', async () => {
    const onUnauthorized = jest.fn();
    const client = new ApiClient({
      baseUrl: 'http://localhost:3000',
      fetchFn: async () => unauthorized(),
    });
    client.setUnauthorizedHandler(onUnauthorized);

    await expect(
      client.signIn({ email: 'someone@email.com', password: 'wrong' }),
    ).rejects.toBeInstanceOf(ApiError);
    expect(onUnauthorized).not.toHaveBeenCalled();
  });
});

describe('toQueryString', () => {
  it('should skip empty values and join lists', () => {
    expect(
      toQueryString({ id: undefined, ids: [1, 2], name_contains: '', take: 5, flag: false }),
    ).toBe('?ids=1%2C2&take=5&flag=false');
  });

  it('should return an empty string when nothing is set', () => {
    expect(toQueryString({ ids: [] })).toBe('');
  });
});
