/**
 * JSON value types.
 *
 * Chain state and contract results are plain JSON so they can be
 * canonicalized and hashed.
 */

export type JsonPrimitive = string | number | boolean | null;

export type JsonObject = { readonly [key: string]: JsonValue };

export type JsonValue = JsonPrimitive | readonly JsonValue[] | JsonObject;
