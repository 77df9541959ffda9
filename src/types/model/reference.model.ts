/**
 * A stored identifier of an entity that lives elsewhere (often in the other
 * store). It owns nothing: deleting the target leaves the reference dangling,
 * and `resolve()` then yields null.
 */
export class WeakReference<T, K extends string | number = string> {
  constructor(
    public readonly id: K,
    private readonly lookup: (id: K) => Promise<T | null>
  ) {}

  resolve(): Promise<T | null> {
    return this.lookup(this.id);
  }

  toJSON(): K {
    return this.id;
  }
}

export type IdentityId = number;
