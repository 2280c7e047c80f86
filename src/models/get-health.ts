import type {AppContext} from '../app-context';
import type {EmptyProps, Health} from './types';

import {defineModel} from '../model-utils';

export const GetHealth = defineModel('GetHealth', function GetHealth(_props: EmptyProps, ctx: AppContext): Health {
  return {
    status: 'healthy',
    application: ctx.config.applicationName,
    todos_in_memory: ctx.store.size,
    timestamp: new Date().toISOString(),
  };
});
