import type {AppContext} from '../app-context';
import type {ApiInfo, EmptyProps, Endpoint} from './types';

import {defineModel} from '../model-utils';

export const ENDPOINTS: Endpoint[] = [
  {method: 'GET', path: '/health', description: 'Liveness check'},
  {method: 'GET', path: '/api/info', description: 'Service metadata'},
  {method: 'GET', path: '/api/todos', description: 'List live todos'},
  {method: 'POST', path: '/api/todos', description: 'Create a todo'},
  {method: 'GET', path: '/api/todos/:id', description: 'Get a todo'},
  {method: 'PUT', path: '/api/todos/:id', description: 'Update a todo'},
  {method: 'PATCH', path: '/api/todos/:id', description: 'Toggle completion'},
  {method: 'PATCH', path: '/api/todos/:id/toggle', description: 'Toggle completion'},
  {method: 'DELETE', path: '/api/todos/:id', description: 'Delete a todo'},
  {method: 'GET', path: '/api/stats', description: 'Todo counts'},
];

export const GetApiInfo = defineModel(
  'GetApiInfo',
  function GetApiInfo(_props: EmptyProps, ctx: AppContext): ApiInfo {
    const {config, store} = ctx;

    return {
      application: config.applicationName,
      version: config.version,
      emissary_url: config.emissaryUrl,
      data_retention_seconds: Math.floor(store.ttl / 1000),
      endpoints: ENDPOINTS,
    };
  },
);
