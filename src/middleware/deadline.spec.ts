import type {Server} from 'node:http';

import express from 'express';
import {afterAll, beforeAll, describe, expect, it} from 'vitest';

import {deadlineMiddleware, readDeadline} from './deadline';

describe('readDeadline', () => {
  it('should read milliseconds from X-Request-Deadline', () => {
    expect(readDeadline({'x-request-deadline': '250'})).toBe(250);
  });

  it('should convert X-Timeout seconds to milliseconds', () => {
    expect(readDeadline({'x-timeout': '2'})).toBe(2000);
  });

  it('should prefer X-Request-Deadline over X-Timeout', () => {
    expect(readDeadline({'x-request-deadline': '250', 'x-timeout': '2'})).toBe(250);
  });

  it('should fall back to X-Timeout when X-Request-Deadline is invalid', () => {
    expect(readDeadline({'x-request-deadline': 'soon', 'x-timeout': '3'})).toBe(3000);
  });

  it('should take the first value of a repeated header', () => {
    expect(readDeadline({'x-request-deadline': ['400', '900']})).toBe(400);
  });

  it.each(['0', '-5', 'abc', ''])('should ignore %j', value => {
    expect(readDeadline({'x-request-deadline': value, 'x-timeout': value})).toBeUndefined();
  });

  it('should return undefined without headers', () => {
    expect(readDeadline({})).toBeUndefined();
  });
});

describe('deadlineMiddleware', () => {
  let server: Server;
  let baseUrl: string;

  beforeAll(async () => {
    const app = express();
    app.use(deadlineMiddleware(30_000));
    app.get('/deadline', (req, res) => {
      res.json({deadline: req.deadline});
    });

    server = await new Promise<Server>(resolve => {
      const listening = app.listen(0, () => resolve(listening));
    });

    const address = server.address();
    if (address === null || typeof address === 'string') {
      throw new Error('Server is not listening on a TCP port');
    }
    baseUrl = `http://127.0.0.1:${address.port}`;
  });

  afterAll(async () => {
    await new Promise<void>((resolve, reject) => {
      server.close(error => (error ? reject(error) : resolve()));
    });
  });

  async function deadlineFor(headers: Record<string, string>) {
    const response = await fetch(`${baseUrl}/deadline`, {headers});
    return response.json();
  }

  it('should use the default deadline', async () => {
    expect(await deadlineFor({})).toEqual({deadline: 30_000});
  });

  it('should use the requested deadline', async () => {
    expect(await deadlineFor({'x-timeout': '5'})).toEqual({deadline: 5000});
  });

  it('should fall back to the default for a non-positive deadline', async () => {
    expect(await deadlineFor({'x-request-deadline': '0'})).toEqual({deadline: 30_000});
  });
});
