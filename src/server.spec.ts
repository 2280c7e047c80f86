import type {Server} from 'node:http';

import {afterEach, beforeEach, describe, expect, it, vi} from 'vitest';

import {loadConfig} from './config';
import {InterruptedError} from './with-models';
import {createApp} from './server';
import {TodoStore} from './store';
import {ManualClock} from './store/__tests__/manual-clock';

describe('todo api', () => {
  let server: Server;
  let baseUrl: string;
  let clock: ManualClock;
  let store: TodoStore;

  beforeEach(async () => {
    clock = new ManualClock();
    store = new TodoStore({clock});
    const config = loadConfig({APPLICATION_NAME: 'todo-test'});

    server = await new Promise<Server>(resolve => {
      const listening = createApp({store, config}).listen(0, () => resolve(listening));
    });

    const address = server.address();
    if (address === null || typeof address === 'string') {
      throw new Error('Server is not listening on a TCP port');
    }
    baseUrl = `http://127.0.0.1:${address.port}`;
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await new Promise<void>((resolve, reject) => {
      server.close(error => (error ? reject(error) : resolve()));
    });
  });

  async function send(method: string, path: string, body?: unknown) {
    const response = await fetch(baseUrl + path, {
      method,
      headers: body === undefined ? {} : {'content-type': 'application/json'},
      body: body === undefined ? undefined : JSON.stringify(body),
    });
    const text = await response.text();

    return {status: response.status, body: text ? JSON.parse(text) : null};
  }

  const post = (path: string, body: unknown) => send('POST', path, body);

  it('should create, toggle and count a todo', async () => {
    const created = await post('/api/todos', {title: 'Buy groceries'});
    expect(created.status).toBe(201);
    expect(created.body).toMatchObject({id: 1, title: 'Buy groceries', description: '', completed: false});

    const toggled = await send('PATCH', '/api/todos/1');
    expect(toggled.status).toBe(200);
    expect(toggled.body.completed).toBe(true);

    const stats = await send('GET', '/api/stats');
    expect(stats.status).toBe(200);
    expect(stats.body).toEqual({total: 1, completed: 1, pending: 0});
  });

  describe('POST /api/todos', () => {
    it('should return the full todo', async () => {
      const {body} = await post('/api/todos', {title: ' Walk the dog ', description: 'twice'});

      expect(body).toEqual({
        id: 1,
        title: 'Walk the dog',
        description: 'twice',
        completed: false,
        created_at: '2024-01-01T12:00:00.000Z',
        updated_at: '2024-01-01T12:00:00.000Z',
        expires_at: '2024-01-01T12:05:00.000Z',
        time_remaining_seconds: 300,
      });
    });

    it.each([{}, {title: ''}, {title: '   '}, {description: 'no title'}])(
      'should reject %j',
      async payload => {
        const response = await post('/api/todos', payload);

        expect(response).toEqual({status: 400, body: {error: 'Title is required'}});
        expect(store.size).toBe(0);
      },
    );

    it('should reject a title that is not a string', async () => {
      const response = await post('/api/todos', {title: 5});

      expect(response.status).toBe(400);
      expect(response.body.error).toMatch(/^title: /);
    });

    it('should reject a request without a body', async () => {
      const response = await send('POST', '/api/todos');

      expect(response).toEqual({status: 400, body: {error: 'Title is required'}});
    });

    it('should reject malformed JSON', async () => {
      const response = await fetch(`${baseUrl}/api/todos`, {
        method: 'POST',
        headers: {'content-type': 'application/json'},
        body: '{"title": ',
      });

      expect(response.status).toBe(400);
      expect(await response.json()).toEqual({error: 'Invalid JSON body'});
    });

    it('should reject an oversized body with 413', async () => {
      const response = await post('/api/todos', {title: 'x'.repeat(200_000)});

      expect(response).toEqual({status: 413, body: {error: 'request entity too large'}});
      expect(store.size).toBe(0);
    });

    it('should reject an unsupported charset with 415', async () => {
      const response = await fetch(`${baseUrl}/api/todos`, {
        method: 'POST',
        headers: {'content-type': 'application/json; charset=bogus'},
        body: JSON.stringify({title: 'Buy groceries'}),
      });

      expect(response.status).toBe(415);
      expect(await response.json()).toEqual({error: 'unsupported charset "BOGUS"'});
    });

    it('should reject a JSON array', async () => {
      const response = await post('/api/todos', ['Buy groceries']);

      expect(response).toEqual({status: 400, body: {error: 'Request body must be a JSON object'}});
    });
  });

  describe('GET /api/todos', () => {
    it('should list live todos in creation order', async () => {
      await post('/api/todos', {title: 'first'});
      clock.advance(3 * 60_000);
      await post('/api/todos', {title: 'second'});
      clock.advance(2 * 60_000);

      const {status, body} = await send('GET', '/api/todos');

      expect(status).toBe(200);
      expect(body).toHaveLength(1);
      expect(body[0]).toMatchObject({id: 2, title: 'second', time_remaining_seconds: 180});
    });

    it('should return an empty list', async () => {
      expect(await send('GET', '/api/todos')).toEqual({status: 200, body: []});
    });
  });

  describe('GET /api/todos/:id', () => {
    it('should return the todo', async () => {
      await post('/api/todos', {title: 'Read'});

      const {status, body} = await send('GET', '/api/todos/1');

      expect(status).toBe(200);
      expect(body.title).toBe('Read');
    });

    it.each(['/api/todos/99', '/api/todos/abc', '/api/todos/0'])('should answer 404 for %s', async path => {
      expect(await send('GET', path)).toEqual({status: 404, body: {error: 'Todo not found'}});
    });

    it('should answer 404 once the todo expired', async () => {
      await post('/api/todos', {title: 'Read'});

      clock.advance(4 * 60_000 + 59_000);
      expect((await send('GET', '/api/todos/1')).status).toBe(200);

      clock.advance(1_000);
      expect(await send('GET', '/api/todos/1')).toEqual({status: 404, body: {error: 'Todo not found'}});
      expect(await send('GET', '/api/stats')).toEqual({
        status: 200,
        body: {total: 0, completed: 0, pending: 0},
      });
    });
  });

  describe('PUT /api/todos/:id', () => {
    it('should overwrite supplied fields only', async () => {
      await post('/api/todos', {title: 'Buy groceries', description: 'milk'});
      clock.advance(10_000);

      const {status, body} = await send('PUT', '/api/todos/1', {completed: true});

      expect(status).toBe(200);
      expect(body).toMatchObject({
        title: 'Buy groceries',
        description: 'milk',
        completed: true,
        updated_at: '2024-01-01T12:00:10.000Z',
      });
    });

    it('should clear the description with null', async () => {
      await post('/api/todos', {title: 'Buy groceries', description: 'milk'});

      const {body} = await send('PUT', '/api/todos/1', {title: 'Buy bread', description: null});

      expect(body).toMatchObject({title: 'Buy bread', description: ''});
    });

    it.each([undefined, {}, {id: 9}])('should reject an empty patch %j', async payload => {
      await post('/api/todos', {title: 'Buy groceries'});
      clock.advance(10_000);

      expect(await send('PUT', '/api/todos/1', payload)).toEqual({
        status: 400,
        body: {error: 'No JSON data provided'},
      });
      expect(store.get(1).updated_at).toBe('2024-01-01T12:00:00.000Z');
    });

    it('should reject an empty title', async () => {
      await post('/api/todos', {title: 'Buy groceries'});

      expect(await send('PUT', '/api/todos/1', {title: ''})).toEqual({
        status: 400,
        body: {error: 'Title cannot be empty'},
      });
    });

    it('should reject a completed flag that is not a boolean', async () => {
      await post('/api/todos', {title: 'Buy groceries'});

      const response = await send('PUT', '/api/todos/1', {completed: 'yes'});

      expect(response.status).toBe(400);
      expect(response.body.error).toMatch(/^completed: /);
    });

    it('should answer 404 for an unknown todo', async () => {
      expect(await send('PUT', '/api/todos/5', {completed: true})).toEqual({
        status: 404,
        body: {error: 'Todo not found'},
      });
    });
  });

  describe('PATCH /api/todos/:id', () => {
    it('should toggle through both routes', async () => {
      await post('/api/todos', {title: 'Stretch'});

      expect((await send('PATCH', '/api/todos/1/toggle')).body.completed).toBe(true);
      expect((await send('PATCH', '/api/todos/1')).body.completed).toBe(false);
    });

    it('should answer 404 for an unknown todo', async () => {
      expect((await send('PATCH', '/api/todos/3')).status).toBe(404);
    });
  });

  describe('DELETE /api/todos/:id', () => {
    it('should delete the todo', async () => {
      await post('/api/todos', {title: 'Call mom'});

      expect(await send('DELETE', '/api/todos/1')).toEqual({status: 204, body: null});
      expect((await send('GET', '/api/todos/1')).status).toBe(404);
      expect((await send('DELETE', '/api/todos/1')).status).toBe(404);
    });
  });

  describe('GET /api/stats', () => {
    it('should count live todos', async () => {
      await post('/api/todos', {title: 'a'});
      await post('/api/todos', {title: 'b'});
      await post('/api/todos', {title: 'c'});
      await send('DELETE', '/api/todos/2');
      await send('PATCH', '/api/todos/1');

      expect((await send('GET', '/api/stats')).body).toEqual({total: 2, completed: 1, pending: 1});
    });

    it('should hide unexpected errors', async () => {
      vi.spyOn(console, 'error').mockImplementation(() => {});
      vi.spyOn(store, 'stats').mockImplementation(() => {
        throw new Error('counter overflow');
      });

      expect(await send('GET', '/api/stats')).toEqual({
        status: 500,
        body: {error: 'Internal server error'},
      });
    });
  });

  describe('GET /api/todos failures', () => {
    it('should answer 503 when the request was interrupted', async () => {
      vi.spyOn(store, 'list').mockImplementation(() => {
        throw new InterruptedError();
      });

      expect(await send('GET', '/api/todos')).toEqual({
        status: 503,
        body: {error: 'Service unavailable'},
      });
    });
  });

  describe('service routes', () => {
    it('should report health', async () => {
      await post('/api/todos', {title: 'a'});

      expect(await send('GET', '/health')).toEqual({
        status: 200,
        body: {
          status: 'healthy',
          application: 'todo-test',
          todos_in_memory: 1,
          timestamp: expect.any(String),
        },
      });
    });

    it('should describe the api', async () => {
      const {status, body} = await send('GET', '/api/info');

      expect(status).toBe(200);
      expect(body).toMatchObject({
        application: 'todo-test',
        version: '1.0.0',
        emissary_url: null,
        data_retention_seconds: 300,
      });
      expect(body.endpoints).toHaveLength(10);
      expect(body.endpoints).toContainEqual({
        method: 'GET',
        path: '/api/stats',
        description: 'Todo counts',
      });
    });

    it('should answer 404 for unknown routes', async () => {
      expect(await send('GET', '/api/unknown')).toEqual({status: 404, body: {error: 'Not found'}});
    });
  });
});
