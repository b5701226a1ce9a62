import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { databaseConfig } from './config/database.config';
import { AuthModule } from './auth/auth.module';
import { BookingModule } from './booking/booking.module';
import { TodoModule } from './todo/todo.module';
import { HelloModule } from './hello/hello.module';

@Module({
  imports: [
    TypeOrmModule.forRoot(databaseConfig),
    AuthModule,
    BookingModule,
    TodoModule,
    HelloModule,
  ],
})
export class AppModule {}
