/**
 * Page-side scripts sent with `Runtime.callFunctionOn`.
 *
 * Kept as plain strings: they run inside the page, not in Node.
 */

/**
 * Resolves to true while the bound object is usable: a DOM node must still
 * be attached to its document, any other object only has to exist.
 */
export const IS_LIVE_FUNCTION = `function() {
  if (typeof Node === 'undefined' || !(this instanceof Node)) return true;
  return this === document || this.isConnected;
}`;

/**
 * Serializes a result for transport. JSON-compatible parts go into a JSON
 * string; anything else (nodes, functions, class instances) is replaced by
 * null and exposed as a `ref_<i>` property with its path listed in `paths`.
 * Without refs the JSON string itself is returned.
 */
export const WRAP_RESULT_FUNCTION = `function(value) {
  const holder = {};
  const paths = [];
  const isPlain = (v) => {
    const proto = Object.getPrototypeOf(v);
    return proto === Object.prototype || proto === null;
  };
  const walk = (v, path) => {
    const t = typeof v;
    if (v === null || t === 'string' || t === 'boolean') return v;
    if (t === 'number') return Number.isFinite(v) ? v : null;
    if (t === 'undefined') return null;
    if (Array.isArray(v)) return v.map((x, i) => walk(x, path.concat([i])));
    if (t === 'object' && isPlain(v)) {
      const out = {};
      for (const k of Object.keys(v)) {
        Object.defineProperty(out, k, {
          value: walk(v[k], path.concat([k])),
          enumerable: true,
          writable: true,
          configurable: true,
        });
      }
      return out;
    }
    holder['ref_' + paths.length] = v;
    paths.push(path);
    return null;
  };
  const json = JSON.stringify(walk(value, []));
  if (paths.length === 0) return json;
  holder.json = json;
  holder.paths = JSON.stringify(paths);
  return holder;
}`;

/**
 * Puts each ref object back at its path inside the argument list.
 */
const UNPACK_ARGUMENTS = `const [__data, __paths, ...__refs] = __args;
  __paths.forEach((path, i) => {
    let target = __data;
    for (let j = 0; j < path.length - 1; j++) target = target[path[j]];
    Object.defineProperty(target, path[path.length - 1], {
      value: __refs[i],
      enumerable: true,
      writable: true,
      configurable: true,
    });
  });`;

/**
 * Wrap a user function declaration so that marshaled handles are restored
 * before the call and the result is serialized by WRAP_RESULT_FUNCTION.
 *
 * @param functionDeclaration - e.g. `function(a, b) { return this.value + a + b; }`
 * @param marshaled - arguments arrive as `[data, paths, ...refs]`
 */
export function buildCallDeclaration(functionDeclaration: string, marshaled: boolean): string {
  const args = marshaled ? '__data' : '__args';
  return `async function(...__args) {
  ${marshaled ? UNPACK_ARGUMENTS : ''}
  const __value = await (${functionDeclaration}
  ).apply(this, ${args});
  return (${WRAP_RESULT_FUNCTION})(__value);
}`;
}
