/***
 * Brand — Nominal typing for TypeScript.
 *
 * Brand<T, Name> intersects T with a phantom readonly symbol property
 * tagged with Name. The symbol never exists at runtime — it only prevents
 * accidental assignment between structurally identical types.
 *
 * Example: a ChainPosition and an AnchorID are both numbers at runtime,
 * but Brand<number, "chain_position"> and Brand<number, "anchor_id">
 * are incompatible at compile time, so an anchor can never be handed
 * to the chain by mistake.
 *
 ***/

declare const brand: unique symbol;

export type Brand<T, BrandName extends string> = T & {
  readonly [brand]: BrandName;
};
