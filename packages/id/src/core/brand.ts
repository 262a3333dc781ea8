declare const brand: unique symbol

/** Nominal wrapper: a `T` that has passed a specific validation. */
export type Brand<T, B extends string> = T & { readonly [brand]: B }
