import type {Clock} from './clock';
import type {Todo, TodoPatch, TodoRecord, TodoStats} from './types';

import {NotFoundError, ValidationError} from '../errors';

import {systemClock} from './clock';

export const DEFAULT_TTL_MS = 5 * 60 * 1000;

export interface TodoStoreOptions {
  clock?: Clock;
  /** Lifetime of a todo in ms, counted from creation. */
  ttl?: number;
}

/**
 * In-memory todo storage with time-based expiration.
 *
 * A todo is visible while `now < createdAt + ttl`. At exactly `createdAt + ttl`
 * it is expired. Expired records are purged as soon as an operation
 * observes them and ids are never reused.
 *
 * Every operation is synchronous, so it runs to completion before the next
 * request is handled.
 */
export class TodoStore {
  private readonly todos = new Map<number, TodoRecord>();

  private nextId = 1;

  private readonly clock: Clock;

  readonly ttl: number;

  constructor({clock = systemClock, ttl = DEFAULT_TTL_MS}: TodoStoreOptions = {}) {
    this.clock = clock;
    this.ttl = ttl;
  }

  /** Records currently held, including expired ones not purged yet. */
  get size() {
    return this.todos.size;
  }

  create(title: string | undefined, description?: string | null): Todo {
    const normalized = title?.trim();
    if (!normalized) {
      throw new ValidationError('Title is required');
    }

    const now = this.clock.now();
    const record: TodoRecord = {
      id: this.nextId++,
      title: normalized,
      description: description?.trim() ?? '',
      completed: false,
      createdAt: now,
      updatedAt: now,
    };

    this.todos.set(record.id, record);

    return this.view(record, now);
  }

  get(id: number): Todo {
    const now = this.clock.now();

    return this.view(this.live(id, now), now);
  }

  /** Live todos in creation order. */
  list(): Todo[] {
    const now = this.clock.now();
    this.purge(now);

    return Array.from(this.todos.values(), record => this.view(record, now));
  }

  update(id: number, patch: TodoPatch): Todo {
    const now = this.clock.now();
    const record = this.live(id, now);

    let title = record.title;
    if (patch.title !== undefined) {
      title = patch.title.trim();
      if (!title) {
        throw new ValidationError('Title cannot be empty');
      }
    }

    record.title = title;
    if (patch.description !== undefined) {
      record.description = patch.description?.trim() ?? '';
    }
    if (patch.completed !== undefined) {
      record.completed = patch.completed;
    }
    record.updatedAt = now;

    return this.view(record, now);
  }

  toggle(id: number): Todo {
    const now = this.clock.now();
    const record = this.live(id, now);

    record.completed = !record.completed;
    record.updatedAt = now;

    return this.view(record, now);
  }

  delete(id: number): void {
    this.live(id, this.clock.now());
    this.todos.delete(id);
  }

  stats(): TodoStats {
    this.purge(this.clock.now());

    let completed = 0;
    for (const record of this.todos.values()) {
      if (record.completed) {
        completed++;
      }
    }

    return {
      total: this.todos.size,
      completed,
      pending: this.todos.size - completed,
    };
  }

  /** Removes every expired record and returns how many were removed. */
  sweep(): number {
    return this.purge(this.clock.now());
  }

  private purge(now: number): number {
    let removed = 0;
    for (const record of this.todos.values()) {
      if (this.isExpired(record, now)) {
        this.todos.delete(record.id);
        removed++;
      }
    }

    return removed;
  }

  private live(id: number, now: number): TodoRecord {
    const record = this.todos.get(id);
    if (!record) {
      throw new NotFoundError();
    }

    if (this.isExpired(record, now)) {
      this.todos.delete(id);
      throw new NotFoundError();
    }

    return record;
  }

  private isExpired(record: TodoRecord, now: number) {
    return now >= record.createdAt + this.ttl;
  }

  private view(record: TodoRecord, now: number): Todo {
    const expiresAt = record.createdAt + this.ttl;

    return {
      id: record.id,
      title: record.title,
      description: record.description,
      completed: record.completed,
      created_at: new Date(record.createdAt).toISOString(),
      updated_at: new Date(record.updatedAt).toISOString(),
      expires_at: new Date(expiresAt).toISOString(),
      time_remaining_seconds: Math.floor((expiresAt - now) / 1000),
    };
  }
}
