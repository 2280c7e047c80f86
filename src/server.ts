import type {AppDependencies} from './app-context';
import type {RequestContext} from './middleware';

import express, {type Express, type NextFunction, type Request, type Response} from 'express';

import {
  contextMiddleware,
  deadlineMiddleware,
  errorMiddleware,
  finishMiddleware,
  requestParamsMiddleware,
  telemetryHeadersMiddleware,
} from './middleware';
import {
  CreateTodo,
  DeleteTodo,
  GetAllTodos,
  GetApiInfo,
  GetHealth,
  GetStats,
  GetTodo,
  RequestParams,
  ToggleTodo,
  UpdateTodo,
} from './models';
import {createTodoSchema, parseBody, parseTodoId, updateTodoSchema} from './validation';

declare global {
  namespace Express {
    interface Request {
      ctx: RequestContext;
      /** Deadline in ms, always set by `deadlineMiddleware`. */
      deadline: number;
    }
  }
}

/**
 * Wraps async handlers so rejections reach the error middleware.
 */
function asyncHandler(fn: (req: Request, res: Response) => Promise<void>) {
  return (req: Request, res: Response, next: NextFunction) => {
    fn(req, res).catch(next);
  };
}

async function toggle(req: Request, res: Response) {
  const todo = await req.ctx.request(ToggleTodo, {id: parseTodoId(req.params.id)});
  res.json(todo);
}

export function createApp(deps: AppDependencies): Express {
  const app = express();

  app.use(telemetryHeadersMiddleware);
  app.use(deadlineMiddleware(deps.config.requestDeadlineMs));
  app.use(contextMiddleware(deps));
  app.use(finishMiddleware);
  app.use(express.json());
  app.use(requestParamsMiddleware);

  app.get('/health', asyncHandler(async (req, res) => {
    res.json(await req.ctx.request(GetHealth, {}));
  }));

  app.get('/api/info', asyncHandler(async (req, res) => {
    res.json(await req.ctx.request(GetApiInfo, {}));
  }));

  app.get('/api/todos', asyncHandler(async (req, res) => {
    const todos = await req.ctx.request(GetAllTodos, {});
    res.json(todos);
  }));

  app.post('/api/todos', asyncHandler(async (req, res) => {
    const {body} = await req.ctx.request(RequestParams, {});
    const {title, description} = parseBody(createTodoSchema, body);

    const todo = await req.ctx.request(CreateTodo, {title, description});
    res.status(201).json(todo);
  }));

  app.get('/api/todos/:id', asyncHandler(async (req, res) => {
    const todo = await req.ctx.request(GetTodo, {id: parseTodoId(req.params.id)});
    res.json(todo);
  }));

  app.put('/api/todos/:id', asyncHandler(async (req, res) => {
    const id = parseTodoId(req.params.id);
    const {body} = await req.ctx.request(RequestParams, {});
    const patch = parseBody(updateTodoSchema, body);

    const todo = await req.ctx.request(UpdateTodo, {id, patch});
    res.json(todo);
  }));

  app.patch('/api/todos/:id', asyncHandler(toggle));
  app.patch('/api/todos/:id/toggle', asyncHandler(toggle));

  app.delete('/api/todos/:id', asyncHandler(async (req, res) => {
    await req.ctx.request(DeleteTodo, {id: parseTodoId(req.params.id)});
    res.status(204).send();
  }));

  app.get('/api/stats', asyncHandler(async (req, res) => {
    res.json(await req.ctx.request(GetStats, {}));
  }));

  app.use((_req, res) => {
    res.status(404).json({error: 'Not found'});
  });

  app.use(errorMiddleware);

  return app;
}
