import type { AuthResponseDto } from '../../../src/auth/dto/auth-response.dto';
import { hasRole as userHasRole } from '../../../src/auth/auth-user';
import { Role } from '../../../src/auth/role.enum';

export const SESSION_KEY = 'bookings.session';

export type SessionStorage = Pick<Storage, 'getItem' | 'setItem' | 'removeItem'>;

export type Session = AuthResponseDto & { bearer_token: string };

export function loadSession(storage: SessionStorage): Session | null {
  const raw = storage.getItem(SESSION_KEY);
  if (!raw) {
    return null;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    parsed = undefined;
  }

  if (!isSession(parsed)) {
    storage.removeItem(SESSION_KEY);
    return null;
  }
  return parsed;
}

export function saveSession(storage: SessionStorage, session: Session): void {
  storage.setItem(SESSION_KEY, JSON.stringify(session));
}

export function clearSession(storage: SessionStorage): void {
  storage.removeItem(SESSION_KEY);
}

export function hasRole(session: Session | null, role: Role): boolean {
  return session !== null && userHasRole(session, role);
}

/** Narrows a sign in/up response to a session when it carries a token. */
export function toSession(response: AuthResponseDto): Session | null {
  const { bearer_token: token } = response;
  return token ? { ...response, bearer_token: token } : null;
}

function isSession(value: unknown): value is Session {
  return (
    typeof value === 'object' &&
    value !== null &&
    'user_id' in value &&
    typeof value.user_id === 'string' &&
    'user_name' in value &&
    typeof value.user_name === 'string' &&
    'display_name' in value &&
    typeof value.display_name === 'string' &&
    'bearer_token' in value &&
    typeof value.bearer_token === 'string' &&
    'roles' in value &&
    Array.isArray(value.roles) &&
    value.roles.every((r: unknown) => typeof r === 'string')
  );
}
