export type { Brand } from "./brand";
export { TYPE_ERROR, TypeError } from "./error";
export {
  is_non_negative_integer,
  is_u32,
  unsafe_cast,
  validate_and_cast,
} from "./assertions";
export {
  GrowableTypedArray,
  GrowableUint32Array,
  TYPED_ARRAY_CTORS,
  create_growable_array,
  is_typed_array_tag,
  type AnyTypedArray,
  type TypedArrayCtor,
  type TypedArrayTag,
} from "./typed_arrays/typed_arrays";
