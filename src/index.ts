export type * from './types';

export * from './context';
export * from './with-models';
export * from './with-telemetry';
export * from './with-deadline';

export {AppContext, type AppDependencies} from './app-context';
export {loadConfig, ConfigError, VERSION, type Config} from './config';
export {HttpError, NotFoundError, ValidationError} from './errors';
export {defineModel} from './model-utils';
export * from './models';
export * from './store';
export {createApp} from './server';
export type {RequestContext} from './middleware';
