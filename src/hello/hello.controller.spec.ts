import { INestApplication } from '@nestjs/common';
import { Test, TestingModule } from '@nestjs/testing';
import request from 'supertest';
import { configureApp } from '../app.setup';
import { HelloModule } from './hello.module';

describe('HelloController (HTTP)', () => {
  let app: INestApplication;

  beforeEach(async () => {
    const module: TestingModule = await Test.createTestingModule({
      imports: [HelloModule],
    }).compile();

    app = configureApp(module.createNestApplication());
    await app.init();
  });

  afterEach(async () => {
    await app.close();
  });

  it('should greet the name in the path', async () => {
    const response = await request(app.getHttpServer()).get('/hello/World');

    expect(response.status).toBe(200);
    expect(response.body).toEqual({ result: 'Hello, World!' });
  });

  it('should decode an escaped name', async () => {
    const response = await request(app.getHttpServer()).get('/hello/Ada%20L');

    expect(response.body).toEqual({ result: 'Hello, Ada L!' });
  });
});
