export type {Todo, TodoPatch, TodoStats} from './types';
export type {Clock} from './clock';

export {systemClock} from './clock';
export {TodoStore, DEFAULT_TTL_MS, type TodoStoreOptions} from './todo-store';
export {startSweeper, DEFAULT_SWEEP_INTERVAL_MS} from './sweeper';
