import type {Context} from '../context';
import type {Json, Model} from '../types';
import type {WithModels} from '../with-models';
import type {ModelInfo, TelemetryConfig, WithTelemetry, WithTelemetryConfig} from './types';
import type {Attributes, Span} from '@opentelemetry/api';

import {AsyncLocalStorage} from 'node:async_hooks';

import {SpanKind, SpanStatusCode, trace, context as otelContext} from '@opentelemetry/api';

import {has} from '../utils';
import {Dead} from '../with-models';

import {__ModelStorage__, __Span__} from './types';
import {
  extractFields,
  extractMessage,
  extractResultFields,
  extractStacktrace,
  isAttributeValue,
} from './utils';

type TelemetryContext = WithTelemetry<WithModels<Context>>;

/** Errors already recorded as a span event. */
const handled = new WeakSet<object>();

function recordError(span: Span, error: unknown) {
  if (!error || typeof error !== 'object' || handled.has(error)) {
    return;
  }

  handled.add(error);
  span.addEvent('error', {
    message: extractMessage(error),
    stack: extractStacktrace(error),
  });
}

/**
 * Returns the OpenTelemetry span of a telemetry-enabled context, if any.
 * Intended for tests and debugging.
 */
export function getSpan(ctx: unknown): Span | undefined {
  if (has(ctx, __Span__)) {
    const span = ctx[__Span__];
    return isSpan(span) ? span : undefined;
  }

  return undefined;
}

function isSpan(value: unknown): value is Span {
  return has(value, 'spanContext') && typeof value.spanContext === 'function';
}

/** @internal Keeps the model telemetry config reachable from `call()`. */
const wrapRequest = (request: WithModels<Context>['request']) =>
  function (
    this: TelemetryContext,
    model: Model<unknown, Json, WithModels<Context>> & WithTelemetryConfig,
    props: unknown,
  ): Promise<unknown> {
    const {displayProps, displayResult, displayTags} = model;

    return this[__ModelStorage__].run({displayProps, displayResult, displayTags, props}, () =>
      request.call(this, model, props),
    );
  };

/** @internal Records context events on the span. */
const wrapEvent = (event: Context['event'], span: Span) =>
  function (this: TelemetryContext, name: string, attributes?: Record<string, unknown>) {
    event.call(this, name, attributes);

    if (!attributes) {
      span.addEvent(name);
      return;
    }

    const valid: Attributes = {};
    for (const [key, value] of Object.entries(attributes)) {
      if (isAttributeValue(value)) {
        valid[key] = value;
      }
    }
    span.addEvent(name, valid);
  };

/**
 * @internal Makes the child span active while the model runs and records
 * props, tags and result on it.
 */
const wrapCall = (call: WithModels<Context>['call']) =>
  function (
    this: TelemetryContext,
    name: string,
    action: (ctx: WithModels<Context>) => Promise<unknown>,
  ): Promise<unknown> {
    const modelInfo = this[__ModelStorage__].getStore();

    return call.call(this, name, child => {
      const span = getSpan(child);
      if (!span) {
        return action(child);
      }

      return otelContext.with(trace.setSpan(otelContext.active(), span), async () => {
        if (modelInfo?.displayProps) {
          span.setAttributes(extractFields(modelInfo.props, modelInfo.displayProps, 'props'));
        }

        if (modelInfo?.displayTags) {
          span.setAttributes(modelInfo.displayTags);
        }

        try {
          const result = await action(child);

          if (modelInfo?.displayResult && result !== Dead) {
            span.addEvent('result', extractResultFields(result, modelInfo.displayResult));
          }

          return result;
        } catch (error) {
          recordError(span, error);
          throw error;
        }
      });
    });
  };

/** @internal Child contexts get their own span under the parent span. */
const wrapCreate = (create: (name: string) => WithModels<Context>, config: TelemetryConfig) =>
  function (this: TelemetryContext, name: string) {
    return wrapContext(create.call(this, name), config);
  };

const wrapEnd = (end: Context['end']) =>
  function (this: TelemetryContext) {
    end.call(this);

    const span = this[__Span__];
    if (span.isRecording()) {
      span.end(this.endTime);
    }
  };

const wrapFail = (fail: Context['fail']) =>
  function (this: TelemetryContext, error: unknown) {
    fail.call(this, error);

    const span = this[__Span__];
    if (span.isRecording()) {
      recordError(span, error);
      span.setStatus({
        code: SpanStatusCode.ERROR,
        message: extractMessage(error),
      });
      span.end(this.endTime);
    }
  };

function wrapContext<CTX extends WithModels<Context>>(
  ctx: CTX,
  config: TelemetryConfig,
): WithTelemetry<CTX> {
  const tracer = trace.getTracer(config.serviceName);
  const activeCtx = otelContext.active();
  const parentSpan = getSpan(ctx.parent);

  // Our own hierarchy wins over whatever span happens to be active.
  const baseCtx = parentSpan ? trace.setSpan(activeCtx, parentSpan) : activeCtx;
  const span = tracer.startSpan(ctx.name, {kind: SpanKind.INTERNAL}, baseCtx);

  const parentStorage = has(ctx.parent, __ModelStorage__) ? ctx.parent[__ModelStorage__] : undefined;
  const modelStorage =
    parentStorage instanceof AsyncLocalStorage ? parentStorage : new AsyncLocalStorage<ModelInfo>();

  Object.assign(ctx, {
    create: wrapCreate(ctx.create, config),
    call: wrapCall(ctx.call),
    request: wrapRequest(ctx.request),
    end: wrapEnd(ctx.end),
    fail: wrapFail(ctx.fail),
    event: wrapEvent(ctx.event, span),
    [__Span__]: span,
    [__ModelStorage__]: modelStorage,
  });

  return ctx as WithTelemetry<CTX>;
}

/**
 * Enhances a `WithModels` context with OpenTelemetry tracing.
 *
 * Models may set `displayProps`, `displayResult` and `displayTags` to choose
 * what their span records.
 *
 * @throws {Error} If `serviceName` is empty
 */
export function withTelemetry(config: TelemetryConfig) {
  if (!config.serviceName || config.serviceName.trim().length === 0) {
    throw new Error('withTelemetry: serviceName must be a non-empty string');
  }

  return function <CTX extends WithModels<Context>>(ctx: CTX) {
    return wrapContext(ctx, config);
  };
}
