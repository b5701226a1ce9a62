import {
  MigrationInterface,
  QueryRunner,
  Table,
  TableForeignKey,
  TableIndex,
} from 'typeorm';
import * as bcrypt from 'bcryptjs';
import { v4 as uuidv4 } from 'uuid';
import { Role } from '../auth/role.enum';
import { RoomType } from '../booking/entities/room-type.enum';

export const SEED_PASSWORD = 'p@55wOrd';

export const SEED_USERS: Array<{ email: string; display_name: string; roles: Role[] }> = [
  { email: 'admin@email.com', display_name: 'Admin User', roles: [Role.Admin] },
  { email: 'manager@email.com', display_name: 'Test Manager', roles: [Role.Manager] },
  { email: 'employee@email.com', display_name: 'Test Employee', roles: [Role.Employee] },
];

const DAY_MS = 24 * 60 * 60 * 1000;

const SEED_BOOKINGS: Array<{
  name: string;
  room_type: RoomType;
  room_number: number;
  start_in_days: number;
  nights: number;
  cost: number;
}> = [
  { name: 'First Booking!', room_type: RoomType.Queen, room_number: 10, start_in_days: 1, nights: 7, cost: 100 },
  { name: 'Booking 2', room_type: RoomType.Double, room_number: 12, start_in_days: 2, nights: 5, cost: 80 },
  { name: 'Booking the 3rd', room_type: RoomType.Suite, room_number: 13, start_in_days: 3, nights: 4, cost: 120 },
];

export class CreateUsersAndBookings1735689600000 implements MigrationInterface {
  name = 'CreateUsersAndBookings1735689600000';

  public async up(queryRunner: QueryRunner): Promise<void> {
    await queryRunner.createTable(
      new Table({
        name: 'user',
        columns: [
          { name: 'id', type: 'uuid', isPrimary: true, default: 'gen_random_uuid()' },
          { name: 'email', type: 'varchar', length: '255' },
          { name: 'display_name', type: 'varchar', length: '255' },
          { name: 'password_hash', type: 'varchar', length: '255' },
          { name: 'roles', type: 'text', default: "''" },
          { name: 'created_at', type: 'timestamptz', default: 'now()' },
          { name: 'updated_at', type: 'timestamptz', default: 'now()' },
        ],
        indices: [{ columnNames: ['email'], isUnique: true }],
      }),
      true,
    );

    await queryRunner.createTable(
      new Table({
        name: 'booking',
        columns: [
          { name: 'id', type: 'int', isPrimary: true, isGenerated: true, generationStrategy: 'increment' },
          { name: 'name', type: 'varchar', length: '255' },
          { name: 'room_type', type: 'varchar', length: '20' },
          { name: 'room_number', type: 'int' },
          { name: 'booking_start_date', type: 'timestamptz' },
          { name: 'booking_end_date', type: 'timestamptz', isNullable: true },
          { name: 'cost', type: 'numeric', precision: 10, scale: 2 },
          { name: 'notes', type: 'text', isNullable: true },
          { name: 'cancelled', type: 'boolean', default: false },
          { name: 'owner_id', type: 'uuid', isNullable: true },
          { name: 'created_at', type: 'timestamptz', default: 'now()' },
          { name: 'created_by', type: 'varchar', length: '255' },
          { name: 'updated_at', type: 'timestamptz', default: 'now()' },
          { name: 'updated_by', type: 'varchar', length: '255' },
          { name: 'deleted_at', type: 'timestamptz', isNullable: true },
          { name: 'deleted_by', type: 'varchar', length: '255', isNullable: true },
        ],
      }),
      true,
    );

    await queryRunner.createForeignKey(
      'booking',
      new TableForeignKey({
        columnNames: ['owner_id'],
        referencedTableName: 'user',
        referencedColumnNames: ['id'],
        onDelete: 'SET NULL',
      }),
    );

    await queryRunner.createIndices('booking', [
      new TableIndex({ columnNames: ['owner_id'] }),
      new TableIndex({ columnNames: ['room_number', 'booking_start_date'] }),
    ]);

    await this.seed(queryRunner);
  }

  public async down(queryRunner: QueryRunner): Promise<void> {
    await queryRunner.dropTable('booking', true);
    await queryRunner.dropTable('user', true);
  }

  private async seed(queryRunner: QueryRunner): Promise<void> {
    const passwordHash = await bcrypt.hash(SEED_PASSWORD, 10);
    const userIds = new Map<string, string>();

    for (const user of SEED_USERS) {
      const id = uuidv4();
      userIds.set(user.email, id);
      await queryRunner.query(
        'INSERT INTO "user" ("id", "email", "display_name", "password_hash", "roles") VALUES ($1, $2, $3, $4, $5)',
        [id, user.email, user.display_name, passwordHash, user.roles.join(',')],
      );
    }

    const ownerEmail = 'employee@email.com';
    const ownerId = userIds.get(ownerEmail) ?? null;
    const today = new Date();
    today.setUTCHours(0, 0, 0, 0);

    for (const booking of SEED_BOOKINGS) {
      const start = new Date(today.getTime() + booking.start_in_days * DAY_MS);
      const end = new Date(start.getTime() + booking.nights * DAY_MS);
      await queryRunner.query(
        'INSERT INTO "booking" ("name", "room_type", "room_number", "booking_start_date", "booking_end_date", "cost", "owner_id", "created_by", "updated_by") VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $8)',
        [
          booking.name,
          booking.room_type,
          booking.room_number,
          start,
          end,
          booking.cost,
          ownerId,
          ownerEmail,
        ],
      );
    }
  }
}
