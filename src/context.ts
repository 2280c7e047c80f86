export class Context {
  private _name: string;

  private _parent: Context | undefined;

  private _startTime: number;

  private _endTime: number | undefined;

  private _error: unknown;

  get name() {
    return this._name;
  }

  get parent() {
    return this._parent;
  }

  get startTime() {
    return this._startTime;
  }

  get endTime() {
    return this._endTime;
  }

  get liveTime() {
    return (this._endTime ?? Date.now()) - this._startTime;
  }

  get error() {
    return this._error;
  }

  constructor(name: string, parent?: Context) {
    this._name = name;
    this._parent = parent;
    this._startTime = Date.now();
  }

  create(name: string): Context {
    return new Context(name, this);
  }

  end() {
    this._endTime = Date.now();
  }

  fail(error: unknown) {
    this._endTime = Date.now();
    this._error = error;
  }

  /**
   * Emits an observability event.
   *
   * No-op here; `withTelemetry` records it on the context span.
   *
   * @example
   * ```typescript
   * ctx.event('todo.expired', {id: 3});
   * ```
   */
  event(_name: string, _attributes?: Record<string, unknown>): void {}
}
