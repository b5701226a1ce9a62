import { Module } from '@nestjs/common';
import { JwtModule } from '@nestjs/jwt';
import { TypeOrmModule } from '@nestjs/typeorm';
import { authConfig } from '../config/auth.config';
import { AuthController } from './auth.controller';
import { User } from './entities/user.entity';
import { JwtAuthGuard } from './guards/jwt-auth.guard';
import { RolesGuard } from './guards/roles.guard';
import { UserRepository } from './repositories/user.repository';
import { AuthService } from './services/auth.service';

@Module({
  controllers: [AuthController],
  providers: [AuthService, UserRepository, JwtAuthGuard, RolesGuard],
  exports: [AuthService, UserRepository, JwtAuthGuard, RolesGuard, JwtModule],
  imports: [
    TypeOrmModule.forFeature([User]),
    JwtModule.register({
      secret: authConfig.jwtSecret,
      signOptions: { expiresIn: authConfig.jwtExpiresIn },
    }),
  ],
})
export class AuthModule {}
