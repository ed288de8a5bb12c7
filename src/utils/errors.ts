/**
 * Error types and codes for promptsmith.
 * All errors raised by the library extend PromptsmithError.
 */

/**
 * Base error class for all promptsmith errors.
 */
export class PromptsmithError extends Error {
  constructor(
    public readonly code: string,
    message: string,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'PromptsmithError';
    Error.captureStackTrace(this, this.constructor);
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      details: this.details,
    };
  }
}

/**
 * Template resolution errors (missing templates, cycles, depth).
 * Error codes: T001-T003
 */
export class TemplateError extends PromptsmithError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'TemplateError';
  }
}

/**
 * Context injection errors.
 * Error codes: C001-C003
 */
export class ContextError extends PromptsmithError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'ContextError';
  }
}

/**
 * Checklist loading and review errors.
 * Error codes: K001-K003
 */
export class ChecklistError extends PromptsmithError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'ChecklistError';
  }
}

/**
 * Configuration-related errors (loading, parsing, validation).
 */
export class ConfigError extends PromptsmithError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'ConfigError';
  }
}

/**
 * System errors (parse errors, git failures).
 * Error codes: S001-S004
 */
export class SystemError extends PromptsmithError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'SystemError';
  }
}

/**
 * Security errors (references escaping the template root).
 */
export class SecurityError extends PromptsmithError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'SecurityError';
  }
}

export const ErrorCodes = {
  // Template errors
  TEMPLATE_NOT_FOUND: 'T001',
  CYCLIC_REFERENCE: 'T002',
  INCLUDE_DEPTH_EXCEEDED: 'T003',

  // Context errors
  UNBOUND_INSERTION_POINT: 'C001',
  UNKNOWN_CONTEXT_KEY: 'C002',
  INVALID_CONTEXT: 'C003',

  // Checklist errors
  CHECKLIST_NOT_FOUND: 'K001',
  INVALID_CHECKLIST: 'K002',
  CHECKLIST_ITEM_PREDICATE_ERROR: 'K003',

  // System errors
  PARSE_ERROR: 'S001',
  CONFIG_LOAD_ERROR: 'S002',
  GIT_ERROR: 'S003',
  FILE_NOT_FOUND: 'S004',

  // Security errors
  PATH_TRAVERSAL: 'SEC001',
} as const;
