import {
  IsBoolean,
  IsEmail,
  IsNotEmpty,
  IsOptional,
  IsString,
  MinLength,
} from 'class-validator';
import { Match } from '../../common/validation/match.decorator';

export class SignUpDto {
  @IsEmail()
  email!: string;

  @IsString()
  @MinLength(8)
  password!: string;

  @IsString()
  @Match('password', { message: 'Passwords do not match' })
  confirm_password!: string;

  @IsString()
  @IsNotEmpty()
  @IsOptional()
  display_name?: string;

  @IsBoolean()
  @IsOptional()
  auto_login?: boolean;
}
