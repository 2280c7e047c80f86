import type {Json} from '../types';

import {defineModel} from '../model-utils';

export type ExpressRequestParams = {
  query: Record<string, string>;
  body: Json;
};

/**
 * Parsed request input.
 *
 * Its value is set by the context middleware through `ctx.set()`;
 * calling it directly is a wiring error.
 */
export const RequestParams = defineModel('RequestParams', function RequestParams(): ExpressRequestParams {
  throw new Error('RequestParams should be set via ctx.set() in middleware');
});
