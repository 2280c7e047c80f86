import type {AppContext} from '../app-context';
import type {TodoStats} from '../store';
import type {EmptyProps} from './types';

import {defineModel} from '../model-utils';

export const GetStats = defineModel(
  'GetStats',
  function GetStats(_props: EmptyProps, ctx: AppContext): TodoStats {
    return ctx.store.stats();
  },
  {
    displayResult: '*',
  },
);
