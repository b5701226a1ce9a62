import {
  Controller,
  Post,
  Body,
  HttpCode,
  HttpStatus,
  Query,
  Get,
  Patch,
  Delete,
  Param,
  ParseIntPipe,
  UseGuards,
} from '@nestjs/common';
import { AuthUser } from '../auth/auth-user';
import { CurrentUser } from '../auth/decorators/current-user.decorator';
import { Roles } from '../auth/decorators/roles.decorator';
import { JwtAuthGuard } from '../auth/guards/jwt-auth.guard';
import { RolesGuard } from '../auth/guards/roles.guard';
import { Role } from '../auth/role.enum';
import { BookingService } from './services/booking.service';
import { CreateBookingDto } from './dto/create-booking.dto';
import { UpdateBookingDto } from './dto/update-booking.dto';
import { QueryBookingsDto } from './dto/query-bookings.dto';

@Controller()
@UseGuards(JwtAuthGuard, RolesGuard)
export class BookingController {
  constructor(private readonly bookingService: BookingService) {}

  @Get('bookings')
  queryBookings(@Query() query: QueryBookingsDto) {
    return this.bookingService.queryBookings(query);
  }

  @Get('bookings/:id')
  getBooking(@Param('id', ParseIntPipe) id: number) {
    return this.bookingService.getBooking(id);
  }

  @Post('bookings')
  @Roles(Role.Employee)
  @HttpCode(HttpStatus.CREATED)
  createBooking(
    @Body() createBookingDto: CreateBookingDto,
    @CurrentUser() user: AuthUser,
  ) {
    return this.bookingService.createBooking(createBookingDto, user);
  }

  @Patch('booking/:id')
  @Roles(Role.Employee)
  updateBooking(
    @Param('id', ParseIntPipe) id: number,
    @Body() updateBookingDto: UpdateBookingDto,
    @CurrentUser() user: AuthUser,
  ) {
    return this.bookingService.updateBooking(id, updateBookingDto, user);
  }

  @Delete('booking/:id')
  @Roles(Role.Manager)
  @HttpCode(HttpStatus.OK)
  deleteBooking(
    @Param('id', ParseIntPipe) id: number,
    @CurrentUser() user: AuthUser,
  ) {
    return this.bookingService.deleteBooking(id, user);
  }
}
