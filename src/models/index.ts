export {GetAllTodos} from './get-all-todos';

export {GetTodo, type GetTodoProps} from './get-todo';

export {CreateTodo, type CreateTodoProps} from './create-todo';

export {UpdateTodo, type UpdateTodoProps} from './update-todo';

export {ToggleTodo, type ToggleTodoProps} from './toggle-todo';

export {DeleteTodo, type DeleteTodoProps} from './delete-todo';

export {GetStats} from './get-stats';

export {GetHealth} from './get-health';

export {GetApiInfo, ENDPOINTS} from './get-api-info';

export {RequestParams, type ExpressRequestParams} from './request-params';

export type {ApiInfo, EmptyProps, Endpoint, Health} from './types';
