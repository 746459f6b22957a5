import type { JsonifibleObject, JsonObject } from '#json';

/**
 * converts any error caught in a try-catch block to a json-compatible format
 *
 * errors carrying a string `kind` or `code` (web errors, node system errors,
 * fastify errors) keep them so that operators can tell failures apart in logs
 * @param error any value that was thrown/caught
 * @returns a json-serializable representation of the error
 */
export function jsonifyError(error: unknown): JsonifibleObject {
  if (error instanceof Error) {
    return jsonifyErrorInstance(error);
  }

  switch (typeof error) {
    case 'object':
      return error === null
        ? { type: 'null', value: error }
        : jsonifyPlainObject(error);
    case 'boolean':
    case 'number':
    case 'string':
    case 'undefined':
      return { type: typeof error, value: error };
    case 'function':
      return { type: 'function', name: error.name || 'anonymous' };
    case 'bigint':
      return { type: 'bigint', value: String(error) };
    case 'symbol':
      return { type: 'symbol', description: error.description };
    default:
      return { type: 'unknown' };
  }
}

/**
 * serializes an error instance including its cause chain
 * @param error the error to serialize
 * @returns json representation of the error
 */
function jsonifyErrorInstance(error: Error): JsonifibleObject {
  const kind = readStringProperty(error, 'kind');
  const code = readStringProperty(error, 'code');

  return {
    type: 'Error',
    name: error.name,
    message: error.message,
    ...(kind !== undefined && { kind }),
    ...(code !== undefined && { code }),
    stack: error.stack,
    ...(error instanceof AggregateError && {
      errors: error.errors.map(jsonifyError),
    }),
    ...(error.cause !== undefined && { cause: jsonifyError(error.cause) }),
  };
}

/**
 * serializes a non-error object, guarding against circular references
 * @param value the object to serialize
 * @returns json representation of the object
 */
function jsonifyPlainObject(value: object): JsonifibleObject {
  const toString = Object.prototype.toString.call(value);
  if (
    toString === '[object WeakMap]' ||
    toString === '[object WeakSet]' ||
    toString === '[object Map]' ||
    toString === '[object Set]'
  ) {
    return { type: 'unknown', toString };
  }

  const serialized = JSON.parse(
    JSON.stringify(value, getCircularReplacer()),
  ) as JsonObject;

  return {
    type: Array.isArray(value) ? 'array' : 'object',
    value: serialized,
  };
}

/**
 * reads a string-valued property from an error if present
 * @param error the error to inspect
 * @param key property name
 * @returns the property value when it is a string
 */
function readStringProperty(error: Error, key: string): string | undefined {
  const value: unknown = Reflect.get(error, key);

  return typeof value === 'string' ? value : undefined;
}

/**
 * creates a replacer function that handles circular references
 * @returns function that replaces circular references for json.stringify
 */
function getCircularReplacer(): (key: string, value: unknown) => unknown {
  const seen = new WeakSet();

  return (_key: string, value: unknown) => {
    if (typeof value === 'function') {
      return undefined;
    }
    if (typeof value === 'object' && value !== null) {
      if (seen.has(value)) {
        return '[Circular]';
      }
      seen.add(value);
    }

    return value;
  };
}
