import type { AuthUser } from '../../../src/auth/auth-user';
import type { AuthResponseDto } from '../../../src/auth/dto/auth-response.dto';
import type { SignInDto } from '../../../src/auth/dto/signin.dto';
import type { SignUpDto } from '../../../src/auth/dto/signup.dto';
import type {
  BookingResponseDto,
  DeleteBookingResponseDto,
} from '../../../src/booking/dto/booking-response.dto';
import type { CreateBookingDto } from '../../../src/booking/dto/create-booking.dto';
import type { QueryBookingsDto } from '../../../src/booking/dto/query-bookings.dto';
import type { UpdateBookingDto } from '../../../src/booking/dto/update-booking.dto';
import type {
  ErrorResponseDto,
  FieldError,
} from '../../../src/common/dto/error-response.dto';
import type { QueryResponse } from '../../../src/common/dto/query-response.dto';
import type { HelloResponseDto } from '../../../src/hello/hello.service';
import type { CreateTodoDto } from '../../../src/todo/dto/create-todo.dto';
import type { QueryTodosDto } from '../../../src/todo/dto/query-todos.dto';
import type { UpdateTodoDto } from '../../../src/todo/dto/update-todo.dto';
import type { Todo } from '../../../src/todo/entities/todo.entity';

export type FetchResponse = Pick<Response, 'ok' | 'status' | 'statusText' | 'json'>;

export type FetchFn = (input: string, init?: RequestInit) => Promise<FetchResponse>;

type QueryValue = string | number | boolean | Array<string | number> | undefined;

export class ApiError extends Error {
  constructor(
    readonly status: number,
    readonly errorCode: string,
    message: string,
    readonly fieldErrors: FieldError[] = [],
  ) {
    super(message);
    this.name = 'ApiError';
  }

  /** Message for one form field, if the server rejected it. */
  fieldError(fieldName: string): string | undefined {
    return this.fieldErrors.find((e) => e.field_name === fieldName)?.message;
  }
}

export interface ApiClientOptions {
  baseUrl: string;
  bearerToken?: string;
  fetchFn?: FetchFn;
}

/**
 * Typed client for the bookings API. Request and response shapes come
 * straight from the server's DTO declarations.
 */
export class ApiClient {
  private readonly baseUrl: string;
  private readonly fetchFn: FetchFn;
  private bearerToken?: string;
  private unauthorizedHandler?: () => void;

  constructor(options: ApiClientOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    this.bearerToken = options.bearerToken;
    this.fetchFn = options.fetchFn ?? ((input, init) => fetch(input, init));
  }

  setBearerToken(token: string | undefined): void {
    this.bearerToken = token;
  }

  /** Called when the server rejects the bearer token with a 401. */
  setUnauthorizedHandler(handler: (() => void) | undefined): void {
    this.unauthorizedHandler = handler;
  }

  hello(name: string): Promise<HelloResponseDto> {
    return this.request('GET', `/hello/${encodeURIComponent(name)}`);
  }

  signIn(dto: SignInDto): Promise<AuthResponseDto> {
    return this.request('POST', '/signin', dto);
  }

  signUp(dto: SignUpDto): Promise<AuthResponseDto> {
    return this.request('POST', '/signup', dto);
  }

  profile(): Promise<AuthUser> {
    return this.request('GET', '/profile');
  }

  queryTodos(query: QueryTodosDto = {}): Promise<QueryResponse<Todo>> {
    return this.request('GET', `/todos${toQueryString({ ...query })}`);
  }

  createTodo(dto: CreateTodoDto): Promise<Todo> {
    return this.request('POST', '/todos', dto);
  }

  updateTodo(id: string, dto: UpdateTodoDto): Promise<Todo> {
    return this.request('PUT', `/todos/${encodeURIComponent(id)}`, dto);
  }

  deleteTodo(id: string): Promise<void> {
    return this.send('DELETE', `/todos/${encodeURIComponent(id)}`);
  }

  deleteTodos(ids: string[]): Promise<void> {
    return this.send('DELETE', `/todos${toQueryString({ ids })}`);
  }

  queryBookings(
    query: QueryBookingsDto = {},
  ): Promise<QueryResponse<BookingResponseDto>> {
    return this.request('GET', `/bookings${toQueryString({ ...query })}`);
  }

  getBooking(id: number): Promise<BookingResponseDto> {
    return this.request('GET', `/bookings/${id}`);
  }

  createBooking(dto: CreateBookingDto): Promise<BookingResponseDto> {
    return this.request('POST', '/bookings', dto);
  }

  updateBooking(id: number, dto: UpdateBookingDto): Promise<BookingResponseDto> {
    return this.request('PATCH', `/booking/${id}`, dto);
  }

  deleteBooking(id: number): Promise<DeleteBookingResponseDto> {
    return this.request('DELETE', `/booking/${id}`);
  }

  private async request<T>(method: string, path: string, body?: object): Promise<T> {
    const response = await this.fetchResponse(method, path, body);
    const result: T = await response.json();
    return result;
  }

  private async send(method: string, path: string, body?: object): Promise<void> {
    await this.fetchResponse(method, path, body);
  }

  private async fetchResponse(
    method: string,
    path: string,
    body?: object,
  ): Promise<FetchResponse> {
    const headers: Record<string, string> = { Accept: 'application/json' };
    if (body !== undefined) {
      headers['Content-Type'] = 'application/json';
    }
    const token = this.bearerToken;
    if (token) {
      headers.Authorization = `Bearer ${token}`;
    }

    const response = await this.fetchFn(`${this.baseUrl}${path}`, {
      method,
      headers,
      body: body === undefined ? undefined : JSON.stringify(body),
    });

    if (!response.ok) {
      if (response.status === 401 && token) {
        this.unauthorizedHandler?.();
      }
      throw await toApiError(response);
    }
    return response;
  }
}

export function toQueryString(params: Record<string, QueryValue>): string {
  const search = new URLSearchParams();
  for (const [key, value] of Object.entries(params)) {
    if (value === undefined || value === '') continue;
    if (Array.isArray(value)) {
      if (value.length > 0) search.set(key, value.join(','));
    } else {
      search.set(key, String(value));
    }
  }
  const query = search.toString();
  return query ? `?${query}` : '';
}

async function toApiError(response: FetchResponse): Promise<ApiError> {
  let body: unknown;
  try {
    body = await response.json();
  } catch {
    body = undefined;
  }

  if (isErrorResponse(body)) {
    return new ApiError(
      body.status_code,
      body.error_code,
      body.message,
      body.errors ?? [],
    );
  }
  return new ApiError(
    response.status,
    'HttpError',
    response.statusText || `Request failed with status ${response.status}`,
  );
}

function isErrorResponse(body: unknown): body is ErrorResponseDto {
  return (
    typeof body === 'object' &&
    body !== null &&
    'status_code' in body &&
    typeof body.status_code === 'number' &&
    'error_code' in body &&
    typeof body.error_code === 'string' &&
    'message' in body &&
    typeof body.message === 'string'
  );
}
