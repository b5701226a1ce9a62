import { INestApplication } from '@nestjs/common';
import { Test, TestingModule } from '@nestjs/testing';
import request from 'supertest';
import { configureApp } from '../app.setup';
import { TodoModule } from './todo.module';

describe('TodoController (HTTP)', () => {
  let app: INestApplication;

  beforeEach(async () => {
    const module: TestingModule = await Test.createTestingModule({
      imports: [TodoModule],
    }).compile();

    app = configureApp(module.createNestApplication());
    await app.init();
  });

  afterEach(async () => {
    await app.close();
  });

  it('should create, update and list todos', async () => {
    const server = app.getHttpServer();

    const created = await request(server).post('/todos').send({ text: 'Learn Nest' });
    expect(created.status).toBe(201);
    expect(created.body.text).toBe('Learn Nest');
    expect(created.body.is_finished).toBe(false);

    const updated = await request(server)
      .put(`/todos/${created.body.id}`)
      .send({ is_finished: true });
    expect(updated.status).toBe(200);
    expect(updated.body.is_finished).toBe(true);

    const listed = await request(server).get('/todos');
    expect(listed.status).toBe(200);
    expect(listed.body).toEqual({
      offset: 0,
      total: 1,
      results: [{ id: created.body.id, text: 'Learn Nest', is_finished: true }],
    });
  });

  it('should reject an empty todo', async () => {
    const response = await request(app.getHttpServer())
      .post('/todos')
      .send({ text: '' });

    expect(response.status).toBe(400);
    expect(response.body.errors).toEqual([
      {
        field_name: 'text',
        error_code: 'NotEmpty',
        message: 'text should not be empty',
      },
    ]);
  });

  it('should reject unknown properties', async () => {
    const response = await request(app.getHttpServer())
      .post('/todos')
      .send({ text: 'ok', priority: 1 });

    expect(response.status).toBe(400);
    expect(response.body.errors).toEqual([
      {
        field_name: 'priority',
        error_code: 'WhitelistValidation',
        message: 'property priority should not exist',
      },
    ]);
  });

  it('should delete todos by id list', async () => {
    const server = app.getHttpServer();
    const a = await request(server).post('/todos').send({ text: 'a' });
    const b = await request(server).post('/todos').send({ text: 'b' });
    const c = await request(server).post('/todos').send({ text: 'c' });

    const deleted = await request(server).delete(
      `/todos?ids=${a.body.id},${c.body.id}`,
    );
    expect(deleted.status).toBe(204);

    const listed = await request(server).get('/todos');
    expect(listed.body.results).toEqual([
      { id: b.body.id, text: 'b', is_finished: false },
    ]);
  });

  it('should return 404 when updating an unknown todo', async () => {
    const response = await request(app.getHttpServer())
      .put('/todos/missing')
      .send({ text: 'x' });

    expect(response.status).toBe(404);
    expect(response.body.error_code).toBe('NotFound');
  });

  it('should delete a single todo and 404 once it is gone', async () => {
    const server = app.getHttpServer();
    const created = await request(server).post('/todos').send({ text: 'once' });

    const deleted = await request(server).delete(`/todos/${created.body.id}`);
    expect(deleted.status).toBe(204);
    expect(deleted.body).toEqual({});

    const again = await request(server).delete(`/todos/${created.body.id}`);
    expect(again.status).toBe(404);
    expect(again.body).toEqual({
      status_code: 404,
      error_code: 'NotFound',
      message: `Todo ${created.body.id} not found`,
    });
  });
});
