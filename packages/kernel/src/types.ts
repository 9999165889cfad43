/**
 * Voucher Kernel Types
 * Shared type definitions for kernel exports
 */

/**
 * JSON-safe primitive
 */
export type JsonPrimitive = string | number | boolean | null;

/**
 * JSON-safe value (no undefined, functions, symbols or bigints)
 */
export type JsonValue = JsonPrimitive | JsonArray | JsonObject;

export type JsonArray = JsonValue[];

export interface JsonObject {
  [key: string]: JsonValue;
}

/**
 * Error code definition
 */
export interface ErrorDefinition {
  code: string;
  title: string;
  description: string;
  retriable: boolean;
  category: 'precondition' | 'policy' | 'ledger' | 'backup';
}

/**
 * Clock returning Unix epoch seconds
 */
export type EpochClock = () => number;

/**
 * Current Unix time in whole seconds
 */
export function epochSeconds(): number {
  return Math.floor(Date.now() / 1000);
}
