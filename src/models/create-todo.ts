import type {AppContext} from '../app-context';
import type {Todo} from '../store';

import {defineModel} from '../model-utils';

export type CreateTodoProps = {
  title?: string;
  description?: string | null;
};

export const CreateTodo = defineModel(
  'CreateTodo',
  function CreateTodo(props: CreateTodoProps, ctx: AppContext): Todo {
    return ctx.store.create(props.title, props.description);
  },
  {
    displayResult: {id: true},
    displayTags: {
      'todo.operation': 'create',
    },
  },
);
