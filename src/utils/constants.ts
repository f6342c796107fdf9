// Returned by Archetype.release_row when the removed row was the last one
export const NO_SWAP = -1;

// GrowableTypedArray defaults
export const DEFAULT_INITIAL_CAPACITY = 16;
export const GROWTH_FACTOR = 2;

// Default typed-array column capacity (override via StorageOptions.initial_capacity)
export const DEFAULT_COLUMN_CAPACITY = 64;

// Largest entity id an archetype's Uint32Array row list can hold
export const MAX_ENTITY_ID = 0xffffffff;

// World allocates entity ids from here
export const FIRST_ENTITY_ID = 0;
