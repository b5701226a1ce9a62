import { ConflictException } from '@nestjs/common';
import { Test, TestingModule } from '@nestjs/testing';
import { getRepositoryToken } from '@nestjs/typeorm';
import { QueryFailedError } from 'typeorm';
import { User } from '../entities/user.entity';
import { UserRepository } from './user.repository';

describe('UserRepository', () => {
  let repository: UserRepository;

  const mockTypeOrmRepository = {
    findOne: jest.fn(),
    create: jest.fn(),
    save: jest.fn(),
  };

  const newUser = {
    email: 'New.User@Email.com',
    display_name: 'New User',
    password_hash: 'hashed',
    roles: [],
  };

  const driverError = (code: string) =>
    Object.assign(new Error('duplicate key value'), { code });

  beforeEach(async () => {
    const module: TestingModule = await Test.createTestingModule({
      providers: [
        UserRepository,
        {
          provide: getRepositoryToken(User),
          useValue: mockTypeOrmRepository,
        },
      ],
    }).compile();

    repository = module.get<UserRepository>(UserRepository);
    mockTypeOrmRepository.create.mockImplementation((user: Partial<User>) =>
      Object.assign(new User(), user),
    );
  });

  afterEach(() => {
    jest.clearAllMocks();
  });

  it('should look users up by lowercased email', async () => {
    mockTypeOrmRepository.findOne.mockResolvedValue(null);

    await repository.findByEmail('Employee@Email.com');

    expect(mockTypeOrmRepository.findOne).toHaveBeenCalledWith({
      where: { email: 'employee@email.com' },
    });
  });

  it('should store the email lowercased', async () => {
    mockTypeOrmRepository.save.mockImplementation(async (user: User) => user);

    const user = await repository.createUser(newUser);

    expect(user.email).toBe('new.user@email.com');
    expect(user.display_name).toBe('New User');
  });

  it('should report a unique email violation as a conflict', async () => {
    mockTypeOrmRepository.save.mockRejectedValue(
      new QueryFailedError('INSERT INTO "user"', [], driverError('23505')),
    );

    await expect(repository.createUser(newUser)).rejects.toThrow(
      new ConflictException('Email already registered'),
    );
  });

  it('should rethrow other query failures unchanged', async () => {
    const failure = new QueryFailedError(
      'INSERT INTO "user"',
      [],
      driverError('23502'),
    );
    mockTypeOrmRepository.save.mockRejectedValue(failure);

    await expect(repository.createUser(newUser)).rejects.toBe(failure);
  });
});
