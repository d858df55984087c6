/**
 * DOM Module
 */

export { querySelector, querySelectorAll, type QueryOptions } from './element-query.js';
export {
  ElementInspector,
  SelectOptionSchema,
  type ElementAttributes,
  type SelectOption,
} from './element-inspector.js';
