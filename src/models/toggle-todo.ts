import type {AppContext} from '../app-context';
import type {Todo} from '../store';

import {defineModel} from '../model-utils';

export type ToggleTodoProps = {
  id: number;
};

export const ToggleTodo = defineModel(
  'ToggleTodo',
  function ToggleTodo(props: ToggleTodoProps, ctx: AppContext): Todo {
    return ctx.store.toggle(props.id);
  },
  {
    displayProps: {id: true},
    displayResult: {completed: true},
    displayTags: {
      'todo.operation': 'toggle',
    },
  },
);
