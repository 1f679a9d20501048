// Map
export { UnorderedMap, type UnorderedMapOptions } from "./unordered_map";

// Element refs
export { ElementRef } from "./element/element_ref";

// Hashing
export {
  default_equals,
  default_hash,
  hash_number,
  hash_string,
  mix_int32,
  type EqualsFn,
  type HashFn,
} from "./hash/hash";

// Buckets
export type { BucketID } from "./bucket/bucket_index";

// Errors
export { AppError, MAP_ERROR, MapError, is_map_error } from "./utils/error";
export { TYPE_ERROR, TypeError } from "./type_primitives/error";
