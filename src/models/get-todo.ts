import type {AppContext} from '../app-context';
import type {Todo} from '../store';

import {defineModel} from '../model-utils';

export type GetTodoProps = {
  id: number;
};

/**
 * Model for retrieving a single live todo
 */
export const GetTodo = defineModel(
  'GetTodo',
  function GetTodo(props: GetTodoProps, ctx: AppContext): Todo {
    return ctx.store.get(props.id);
  },
  {
    displayProps: {id: true},
    displayResult: {completed: true, time_remaining_seconds: true},
  },
);
