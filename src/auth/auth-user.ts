import { Role } from './role.enum';

/** The authenticated principal attached to each guarded request. */
export interface AuthUser {
  id: string;
  email: string;
  display_name: string;
  roles: string[];
}

export interface JwtPayload {
  sub: string;
  email: string;
  display_name: string;
  roles: string[];
}

export function hasRole(user: Pick<AuthUser, 'roles'>, role: Role): boolean {
  return user.roles.includes(Role.Admin) || user.roles.includes(role);
}
