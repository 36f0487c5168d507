/**
 * Extra Functions
 *
 * Channels expose additional commands ("extra functions") to the user by
 * marking them with `extra()`. The marker records a descriptor for the
 * function's identity; hosts find marked functions on a channel with
 * `getExtraFunctions()` and call them with `invokeExtraFunction()`.
 *
 * @example
 * class IrcChannel {
 *   readonly join = extra(
 *     'Join channel',
 *     'Join an IRC channel. Usage: {function_name} #channel'
 *   )((param: string) => this.client.join(param));
 * }
 */

import { ExtraFunctionError, ExtraFunctionNotFoundError } from '../utils/errors.js';
import { getLogger } from '../utils/logger.js';

const log = getLogger('efb.extra');

export const FUNCTION_NAME_PLACEHOLDER = '{function_name}';

/**
 * Extra functions take the text the user typed after the command
 */
export type ExtraFunctionHandler = (param: string) => unknown;

export interface ExtraFunctionDescriptor {
  readonly extraFunction: true;
  /** Human readable name */
  readonly name: string;
  /** Usage text; may contain {function_name} */
  readonly description: string;
}

export interface ExtraFunction extends ExtraFunctionDescriptor {
  /** Property name the function is reachable under */
  readonly id: string;
  readonly handler: ExtraFunctionHandler;
}

interface ExtraFunctionRecord extends ExtraFunctionDescriptor {
  readonly handler: ExtraFunctionHandler;
}

const extraFunctions = new WeakMap<object, ExtraFunctionRecord>();

/**
 * Create a marker for an extra function.
 *
 * The marked function is returned as is. Marking it again replaces
 * the descriptor.
 */
export function extra(name: string, description: string): <F extends ExtraFunctionHandler>(fn: F) => F {
  return <F extends ExtraFunctionHandler>(fn: F): F => {
    extraFunctions.set(fn, { extraFunction: true, name, description, handler: fn });
    return fn;
  };
}

export function getExtraFunctionDescriptor(fn: unknown): ExtraFunctionDescriptor | undefined {
  if (typeof fn !== 'function') {
    return undefined;
  }
  const record = extraFunctions.get(fn);
  if (!record) {
    return undefined;
  }
  return { extraFunction: true, name: record.name, description: record.description };
}

export function isExtraFunction(fn: unknown): boolean {
  return getExtraFunctionDescriptor(fn) !== undefined;
}

/**
 * Collect the extra functions reachable on an object, keyed by property name.
 *
 * Own properties are checked first, then each prototype up to
 * Object.prototype. A name seen lower in the chain hides the same name
 * further up. Accessors are never invoked.
 */
export function getExtraFunctions(target: object): Map<string, ExtraFunction> {
  const found = new Map<string, ExtraFunction>();
  const seen = new Set<string>();

  let current: object | null = target;
  while (current !== null && current !== Object.prototype) {
    for (const key of Object.getOwnPropertyNames(current)) {
      if (key === 'constructor' || seen.has(key)) continue;
      seen.add(key);

      const property = Object.getOwnPropertyDescriptor(current, key);
      if (!property || typeof property.value !== 'function') continue;

      const record = extraFunctions.get(property.value);
      if (record) {
        found.set(key, {
          id: key,
          extraFunction: true,
          name: record.name,
          description: record.description,
          handler: record.handler
        });
      }
    }
    current = Object.getPrototypeOf(current);
  }

  return found;
}

/**
 * Fill in the {function_name} placeholder of a description
 */
export function formatExtraDescription(fn: ExtraFunction): string {
  return fn.description.replaceAll(FUNCTION_NAME_PLACEHOLDER, fn.id);
}

/**
 * Call an extra function of a channel by id.
 *
 * @throws ExtraFunctionNotFoundError when the target has no extra function with that id
 * @throws ExtraFunctionError when the function does not produce a string
 */
export async function invokeExtraFunction(target: object, id: string, param = ''): Promise<string> {
  const fn = getExtraFunctions(target).get(id);
  if (!fn) {
    throw new ExtraFunctionNotFoundError(id);
  }

  log.debug('Invoking extra function %s with %j', id, param);
  const result: unknown = await fn.handler.call(target, param);

  if (typeof result !== 'string') {
    throw new ExtraFunctionError(id, `expected a string result, got ${typeof result}`);
  }
  return result;
}
