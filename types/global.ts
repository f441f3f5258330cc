/**
 * A class whose instances can be created without arguments. Instances of
 * such a class double as a description of the shape they are decoded into.
 */
export type Constructor<T> = new () => T;

declare const phantom: unique symbol;

/**
 * A named stand-in for a type that has no runtime representation of its own,
 * such as an interface or a type alias. Tokens are compared by identity.
 */
export type TypeToken<T> = {
  readonly name: string;
  /**
   * Never present at runtime. Only carries `T`.
   */
  readonly [phantom]?: T;
};

/**
 * The declared type of the elements of a streamed array.
 */
export type DeclaredType<T> = Constructor<T> | TypeToken<T>;
