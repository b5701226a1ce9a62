import {
  ConflictException,
  Injectable,
  Logger,
  UnauthorizedException,
} from '@nestjs/common';
import { JwtService } from '@nestjs/jwt';
import * as bcrypt from 'bcryptjs';
import { JwtPayload } from '../auth-user';
import { AuthResponseDto } from '../dto/auth-response.dto';
import { SignInDto } from '../dto/signin.dto';
import { SignUpDto } from '../dto/signup.dto';
import { User } from '../entities/user.entity';
import { UserRepository } from '../repositories/user.repository';

export const PASSWORD_SALT_ROUNDS = 10;

// compared against when the email is unknown so both failures cost a hash
const UNKNOWN_USER_HASH = bcrypt.hashSync('unknown-user', PASSWORD_SALT_ROUNDS);

@Injectable()
export class AuthService {
  private readonly logger = new Logger(AuthService.name);

  constructor(
    private readonly userRepository: UserRepository,
    private readonly jwtService: JwtService,
  ) {}

  /**
   * Register a new user. New accounts have no roles; a signed token is only
   * issued when `auto_login` is set. A concurrent sign up that loses the race
   * on the unique email index is reported by the repository as a conflict.
   */
  async signUp(dto: SignUpDto): Promise<AuthResponseDto> {
    const existing = await this.userRepository.findByEmail(dto.email);
    if (existing) {
      throw new ConflictException('Email already registered');
    }

    const user = await this.userRepository.createUser({
      email: dto.email,
      display_name: dto.display_name ?? dto.email.split('@')[0],
      password_hash: await bcrypt.hash(dto.password, PASSWORD_SALT_ROUNDS),
      roles: [],
    });

    this.logger.log(`Registered user ${user.email}`);

    return dto.auto_login
      ? await this.issueToken(user)
      : this.toAuthResponse(user);
  }

  async signIn(dto: SignInDto): Promise<AuthResponseDto> {
    const user = await this.userRepository.findByEmail(dto.email);
    const valid = await bcrypt.compare(
      dto.password,
      user?.password_hash ?? UNKNOWN_USER_HASH,
    );

    if (!user || !valid) {
      this.logger.warn(`Rejected sign in for ${dto.email}`);
      throw new UnauthorizedException('Invalid email or password');
    }

    return await this.issueToken(user);
  }

  private async issueToken(user: User): Promise<AuthResponseDto> {
    const payload: JwtPayload = {
      sub: user.id,
      email: user.email,
      display_name: user.display_name,
      roles: user.roles,
    };
    const bearerToken = await this.jwtService.signAsync(payload);

    return { ...this.toAuthResponse(user), bearer_token: bearerToken };
  }

  private toAuthResponse(user: User): AuthResponseDto {
    return {
      user_id: user.id,
      user_name: user.email,
      display_name: user.display_name,
      roles: user.roles,
    };
  }
}
