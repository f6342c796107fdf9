import { ECS_ERROR, is_ecs_error } from "../utils/error";

/** Run fn and return the category of the ECSError it throws, if any. */
export function error_category(fn: () => unknown): ECS_ERROR | undefined {
  try {
    fn();
  } catch (e) {
    if (is_ecs_error(e)) return e.category;
    throw e;
  }
  return undefined;
}
