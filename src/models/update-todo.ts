import type {AppContext} from '../app-context';
import type {Todo, TodoPatch} from '../store';

import {defineModel} from '../model-utils';

export type UpdateTodoProps = {
  id: number;
  patch: TodoPatch;
};

/**
 * Model for overwriting the supplied fields of a todo
 */
export const UpdateTodo = defineModel(
  'UpdateTodo',
  function UpdateTodo(props: UpdateTodoProps, ctx: AppContext): Todo {
    return ctx.store.update(props.id, props.patch);
  },
  {
    displayProps: {id: true},
    displayTags: {
      'todo.operation': 'update',
    },
  },
);
