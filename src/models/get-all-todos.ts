import type {AppContext} from '../app-context';
import type {Todo} from '../store';
import type {EmptyProps} from './types';

import {defineModel} from '../model-utils';

export const GetAllTodos = defineModel(
  'GetAllTodos',
  function GetAllTodos(_props: EmptyProps, ctx: AppContext): Todo[] {
    return ctx.store.list();
  },
  {
    displayResult: '*',
  },
);
