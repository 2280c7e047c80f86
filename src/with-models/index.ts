export type * from './types';

export {Dead} from './types';
export {withModels, InterruptedError} from './with-models';
