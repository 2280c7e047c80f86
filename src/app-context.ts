import type {Config} from './config';
import type {TodoStore} from './store';

import {Context} from './context';

export interface AppDependencies {
  store: TodoStore;
  config: Config;
}

/**
 * Request context carrying the process-wide store and configuration.
 * Child contexts created for model calls share both.
 */
export class AppContext extends Context {
  readonly store: TodoStore;

  readonly config: Config;

  constructor(name: string, {store, config}: AppDependencies, parent?: Context) {
    super(name, parent);
    this.store = store;
    this.config = config;
  }

  create(name: string): AppContext {
    return new AppContext(name, {store: this.store, config: this.config}, this);
  }
}
