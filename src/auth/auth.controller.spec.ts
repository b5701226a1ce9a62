import { ConflictException, INestApplication } from '@nestjs/common';
import { JwtModule } from '@nestjs/jwt';
import { Test, TestingModule } from '@nestjs/testing';
import * as bcrypt from 'bcryptjs';
import request from 'supertest';
import { configureApp } from '../app.setup';
import { AuthController } from './auth.controller';
import { User } from './entities/user.entity';
import { JwtAuthGuard } from './guards/jwt-auth.guard';
import { UserRepository } from './repositories/user.repository';
import { Role } from './role.enum';
import { AuthService } from './services/auth.service';

describe('AuthController (HTTP)', () => {
  let app: INestApplication;

  const mockUserRepository = {
    findByEmail: jest.fn(),
    createUser: jest.fn(),
  };

  const manager = Object.assign(new User(), {
    id: 'user-manager',
    email: 'manager@email.com',
    display_name: 'Test Manager',
    password_hash: bcrypt.hashSync('test-password', 4),
    roles: [Role.Manager],
  });

  beforeEach(async () => {
    const module: TestingModule = await Test.createTestingModule({
      imports: [JwtModule.register({ secret: 'test-secret' })],
      controllers: [AuthController],
      providers: [
        AuthService,
        JwtAuthGuard,
        {
          provide: UserRepository,
          useValue: mockUserRepository,
        },
      ],
    }).compile();

    app = configureApp(module.createNestApplication());
    await app.init();
  });

  afterEach(async () => {
    jest.clearAllMocks();
    await app.close();
  });

  it('should sign in and return the session', async () => {
    mockUserRepository.findByEmail.mockResolvedValue(manager);

    const response = await request(app.getHttpServer())
      .post('/signin')
      .send({ email: 'manager@email.com', password: 'test-password' });

    expect(response.status).toBe(200);
    expect(response.body.user_id).toBe('user-manager');
    expect(response.body.roles).toEqual(['Manager']);
    expect(typeof response.body.bearer_token).toBe('string');
  });

  it('should answer a failed sign in with 401', async () => {
    mockUserRepository.findByEmail.mockResolvedValue(manager);

    const response = await request(app.getHttpServer())
      .post('/signin')
      .send({ email: 'manager@email.com', password: 'not-it' });

    expect(response.status).toBe(401);
    expect(response.body).toEqual({
      status_code: 401,
      error_code: 'Unauthorized',
      message: 'Invalid email or password',
    });
  });

  it('should reject a sign up whose passwords differ', async () => {
    const response = await request(app.getHttpServer())
      .post('/signup')
      .send({
        email: 'new.user@email.com',
        password: 'test-password',
        confirm_password: 'other-password',
      });

    expect(response.status).toBe(400);
    expect(response.body).toEqual({
      status_code: 400,
      error_code: 'ValidationFailed',
      message: 'Passwords do not match',
      errors: [
        {
          field_name: 'confirm_password',
          error_code: 'Match',
          message: 'Passwords do not match',
        },
      ],
    });
    expect(mockUserRepository.createUser).not.toHaveBeenCalled();
  });

  it('should register a new user', async () => {
    mockUserRepository.findByEmail.mockResolvedValue(null);
    mockUserRepository.createUser.mockImplementation(
      async (user: Partial<User>) =>
        Object.assign(new User(), user, { id: 'user-new' }),
    );

    const response = await request(app.getHttpServer())
      .post('/signup')
      .send({
        email: 'new.user@email.com',
        password: 'test-password',
        confirm_password: 'test-password',
        display_name: 'New User',
      });

    expect(response.status).toBe(201);
    expect(response.body).toEqual({
      user_id: 'user-new',
      user_name: 'new.user@email.com',
      display_name: 'New User',
      roles: [],
    });
  });

  it('should answer a sign up for a registered email with 409', async () => {
    mockUserRepository.findByEmail.mockResolvedValue(manager);

    const response = await request(app.getHttpServer())
      .post('/signup')
      .send({
        email: 'manager@email.com',
        password: 'test-password',
        confirm_password: 'test-password',
      });

    expect(response.status).toBe(409);
    expect(response.body).toEqual({
      status_code: 409,
      error_code: 'Conflict',
      message: 'Email already registered',
    });
    expect(mockUserRepository.createUser).not.toHaveBeenCalled();
  });

  it('should answer 409 when the email is taken between check and insert', async () => {
    mockUserRepository.findByEmail.mockResolvedValue(null);
    mockUserRepository.createUser.mockRejectedValue(
      new ConflictException('Email already registered'),
    );

    const response = await request(app.getHttpServer())
      .post('/signup')
      .send({
        email: 'new.user@email.com',
        password: 'test-password',
        confirm_password: 'test-password',
      });

    expect(response.status).toBe(409);
    expect(response.body.error_code).toBe('Conflict');
  });

  it('should return the profile of the signed in user', async () => {
    mockUserRepository.findByEmail.mockResolvedValue(manager);
    const signIn = await request(app.getHttpServer())
      .post('/signin')
      .send({ email: 'manager@email.com', password: 'test-password' });

    const response = await request(app.getHttpServer())
      .get('/profile')
      .set('Authorization', `Bearer ${signIn.body.bearer_token}`);

    expect(response.status).toBe(200);
    expect(response.body).toEqual({
      id: 'user-manager',
      email: 'manager@email.com',
      display_name: 'Test Manager',
      roles: ['Manager'],
    });
  });

  it('should require a token for the profile', async () => {
    const response = await request(app.getHttpServer()).get('/profile');

    expect(response.status).toBe(401);
  });
});
