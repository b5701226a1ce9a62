export interface AuthResponseDto {
  user_id: string;
  user_name: string;
  display_name: string;
  roles: string[];
  bearer_token?: string;
}
