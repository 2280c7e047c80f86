import type {AppContext} from '../app-context';

import {defineModel} from '../model-utils';

export type DeleteTodoProps = {
  id: number;
};

export const DeleteTodo = defineModel(
  'DeleteTodo',
  function DeleteTodo(props: DeleteTodoProps, ctx: AppContext): boolean {
    ctx.store.delete(props.id);
    return true;
  },
  {
    displayProps: {id: true},
    displayTags: {
      'todo.operation': 'delete',
    },
  },
);
