export interface IdGenerator<T> {
  /** Produce a new, unique id. */
  generate(): T
}
