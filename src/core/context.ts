/**
 * Skeletal Context - scoped variable bindings
 *
 * Lookups walk the parent chain; writes only ever touch the local map, so a
 * loop iteration or partial can shadow a name without changing its parent.
 * Storage is a Map, never an object prototype chain, so binding names can
 * not reach Object.prototype.
 */

// Names that must never be bound
const DANGEROUS_NAMES: { [key: string]: boolean } = Object.create(null);
DANGEROUS_NAMES['__proto__'] = true;
DANGEROUS_NAMES['constructor'] = true;
DANGEROUS_NAMES['prototype'] = true;

export function isDangerousName(name: string): boolean {
  return DANGEROUS_NAMES[name] === true;
}

export class Context {
  private readonly _data = new Map<string, unknown>();
  private readonly _parent: Context | null;

  constructor(parent: Context | null = null) {
    this._parent = parent;
  }

  /**
   * Create a context from a plain object's own enumerable keys.
   */
  static from(bindings: Record<string, unknown>, parent: Context | null = null): Context {
    const context = new Context(parent);
    for (const key of Object.keys(bindings)) {
      context.set(key, bindings[key]);
    }
    return context;
  }

  /** Check if a name exists in this context or any parent */
  has(name: string): boolean {
    if (this._data.has(name)) return true;
    return this._parent ? this._parent.has(name) : false;
  }

  /** Get a value from this context or the nearest parent that binds it */
  get(name: string): unknown {
    if (this._data.has(name)) return this._data.get(name);
    return this._parent ? this._parent.get(name) : undefined;
  }

  /** Bind a name locally (never writes to a parent) */
  set(name: string, value: unknown): this {
    if (isDangerousName(name)) {
      throw new TypeError(
        `Skeletal: Cannot bind "${name}" in a template context.\n` +
        'This name is blocked to prevent prototype pollution.'
      );
    }
    this._data.set(name, value);
    return this;
  }

  hasOwn(name: string): boolean {
    return this._data.has(name);
  }

  delete(name: string): boolean {
    return this._data.delete(name);
  }

  /** Local names, in binding order */
  keys(): IterableIterator<string> {
    return this._data.keys();
  }

  getParent(): Context | null {
    return this._parent;
  }

  /** New empty context delegating to this one */
  child(bindings?: Record<string, unknown>): Context {
    return bindings ? Context.from(bindings, this) : new Context(this);
  }

  /** Local bindings as a plain object (parents not included) */
  toObject(): Record<string, unknown> {
    const out: Record<string, unknown> = {};
    for (const [key, value] of this._data) out[key] = value;
    return out;
  }
}
