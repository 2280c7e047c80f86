/**
 * A todo as returned by the API. Timestamps are ISO-8601 strings.
 */
export type Todo = {
  id: number;
  title: string;
  description: string;
  completed: boolean;
  created_at: string;
  updated_at: string;
  expires_at: string;
  time_remaining_seconds: number;
};

/**
 * Partial update. `undefined` leaves a field untouched, `null` clears it
 * (only `description` can be cleared).
 */
export type TodoPatch = {
  title?: string;
  description?: string | null;
  completed?: boolean;
};

export type TodoStats = {
  total: number;
  completed: number;
  pending: number;
};

/** @internal Stored shape, times in epoch ms. */
export interface TodoRecord {
  id: number;
  title: string;
  description: string;
  completed: boolean;
  createdAt: number;
  updatedAt: number;
}
