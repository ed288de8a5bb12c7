/**
 * Context injection type definitions.
 */
import type { UnknownKeyPolicy } from '../config/schema.js';

/**
 * Insertion point name → substitution text.
 * Insertion order is preserved by Map and by plain object string keys.
 */
export type ContextValues = ReadonlyMap<string, string> | Readonly<Record<string, string>>;

/**
 * A non-fatal issue found while composing.
 */
export interface CompositionWarning {
  code: string;
  message: string;
  key?: string;
}

/**
 * Result of injecting context into a resolved template.
 */
export interface Composition {
  template: string;
  text: string;
  /** Insertion points that were substituted */
  bound: string[];
  warnings: CompositionWarning[];
}

export interface ContextInjectorOptions {
  /** Handling of context keys the template does not use (default: warn) */
  unknownKeys?: UnknownKeyPolicy;
}
