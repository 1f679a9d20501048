// List terminator shared by the element chain and the bucket index
export const ABSENT = -1;

// Slot 0 of the element chain is the before-first sentinel; elements start at 1
export const BEFORE_BEGIN_SLOT = 0;
export const FIRST_ELEMENT_SLOT = 1;

// Element slot generation
export const INITIAL_GENERATION = 0;
export const INITIAL_SLOT_CAPACITY = 16;

// Bucket index growth
export const INITIAL_BUCKET_COUNT = 1;
export const MAX_LOAD_FACTOR = 1.0;
export const BUCKET_GROWTH_FACTOR = 2;

// GrowableTypedArray defaults
export const DEFAULT_INITIAL_CAPACITY = 16;
export const GROWTH_FACTOR = 2;

// FNV-1a hash constants (used for strings)
export const FNV_OFFSET_BASIS = 0x811c9dc5;
export const FNV_PRIME = 0x01000193;

// murmur3 fmix32 multipliers (used for integers and identity ids)
export const MIX_MULTIPLIER_A = 0x85ebca6b;
export const MIX_MULTIPLIER_B = 0xc2b2ae35;

// Fixed hashes for the unit-like primitives
export const NULL_HASH = 0x9e3779b9;
export const UNDEFINED_HASH = 0x517cc1b7;
