/**
 * Error Registry
 * Central error definition registry with template rendering.
 */

// ============================================================
// ERROR CATEGORIES
// ============================================================

/** Error category determining error ID prefix */
export type ErrorCategory = 'validation' | 'config' | 'transport' | 'api';

/** Error registry entry containing all metadata for a single error condition */
export interface ErrorDefinition {
  /** Format: VS-{category}{3-digit} (e.g., VS-V001) */
  readonly errorId: string;
  /** Error category (determines ID prefix) */
  readonly category: ErrorCategory;
  /** Human-readable description (max 50 characters) */
  readonly description: string;
  /** Message template with {placeholder} syntax */
  readonly messageTemplate: string;
  /** What causes this error (max 200 characters) */
  readonly cause?: string | undefined;
  /** How to resolve this error (max 300 characters) */
  readonly resolution?: string | undefined;
}

// ============================================================
// ERROR REGISTRY
// ============================================================

/**
 * Central registry for all error definitions with O(1) lookup.
 * Immutable after initialization.
 */
export interface ErrorRegistry {
  get(errorId: string): ErrorDefinition | undefined;
  has(errorId: string): boolean;
  readonly size: number;
  entries(): IterableIterator<[string, ErrorDefinition]>;
}

class ErrorRegistryImpl implements ErrorRegistry {
  private readonly byId: ReadonlyMap<string, ErrorDefinition>;

  constructor(definitions: ErrorDefinition[]) {
    const idMap = new Map<string, ErrorDefinition>();

    for (const def of definitions) {
      idMap.set(def.errorId, def);
    }

    this.byId = idMap;
  }

  get(errorId: string): ErrorDefinition | undefined {
    return this.byId.get(errorId);
  }

  has(errorId: string): boolean {
    return this.byId.has(errorId);
  }

  get size(): number {
    return this.byId.size;
  }

  entries(): IterableIterator<[string, ErrorDefinition]> {
    return this.byId.entries();
  }
}

/** All error definitions indexed by error ID */
const ERROR_DEFINITIONS: ErrorDefinition[] = [
  // Validation Errors (VS-V0xx)
  {
    errorId: 'VS-V001',
    category: 'validation',
    description: 'Invalid argument',
    messageTemplate: '{field}: {reason}',
    cause: 'An argument failed client-side validation before any request was sent.',
    resolution: 'Correct the argument named in the message and retry the call.',
  },
  {
    errorId: 'VS-V002',
    category: 'validation',
    description: 'Vector dimension mismatch',
    messageTemplate:
      '{field}: dimension mismatch (expected {expected}, got {actual})',
    cause:
      'A vector length differs from the dimension declared by its collection.',
    resolution:
      'Embed with the model the collection was created for, or create a collection with the matching dimension.',
  },
  {
    errorId: 'VS-V003',
    category: 'validation',
    description: 'Batch too large',
    messageTemplate: 'batch of {size} items exceeds limit of {limit}',
    cause: 'A batch operation was given more items than maxBatchSize allows.',
    resolution:
      'Split the batch into smaller calls or raise maxBatchSize if the server accepts it.',
  },
  {
    errorId: 'VS-V004',
    category: 'validation',
    description: 'Duplicate item id in batch',
    messageTemplate: '{field}: duplicate id "{id}"',
    cause: 'The same item id appears more than once in one batch.',
    resolution: 'Deduplicate ids before sending the batch.',
  },

  // Configuration Errors (VS-C0xx)
  {
    errorId: 'VS-C001',
    category: 'config',
    description: 'Invalid configuration',
    messageTemplate: 'Invalid configuration: {reason}',
    cause:
      'A configuration value from options, file, or environment is malformed.',
    resolution:
      'Fix the value named in the message. Environment variables use the VECTORSCOPE_ prefix.',
  },
  {
    errorId: 'VS-C002',
    category: 'config',
    description: 'Configuration file unreadable',
    messageTemplate: 'Cannot read configuration file {path}: {reason}',
    cause: 'The configuration file is missing or is not valid YAML.',
    resolution: 'Check the path and the YAML syntax of the file.',
  },

  // Transport Errors (VS-T0xx)
  {
    errorId: 'VS-T001',
    category: 'transport',
    description: 'Network error',
    messageTemplate: '{method} {path}: network error — {message}',
    cause: 'The server could not be reached or the connection was reset.',
    resolution:
      'Check host, port and protocol, and that the server is running. Transient failures are retried up to maxRetries.',
  },
  {
    errorId: 'VS-T002',
    category: 'transport',
    description: 'Request timeout',
    messageTemplate: '{method} {path}: request timeout ({timeoutMs}ms)',
    cause: 'The server did not answer within the per-request timeout.',
    resolution: 'Raise the timeout option or investigate server load.',
  },
  {
    errorId: 'VS-T003',
    category: 'transport',
    description: 'Request aborted',
    messageTemplate: '{method} {path}: request aborted',
    cause: 'The caller aborted the request through its AbortSignal.',
    resolution:
      'Retry mutating calls with an idempotency key if the outcome is unknown.',
  },
  {
    errorId: 'VS-T004',
    category: 'transport',
    description: 'Client closed',
    messageTemplate: 'client closed',
    cause: 'An operation was called after close().',
    resolution: 'Create a new client instance.',
  },

  // API Errors (VS-A0xx)
  {
    errorId: 'VS-A001',
    category: 'api',
    description: 'Resource not found',
    messageTemplate: '{resource} not found: {name}',
    cause: 'The referenced tenant, database, collection or items do not exist.',
    resolution: 'Check the name, tenant and database the client points at.',
  },
  {
    errorId: 'VS-A002',
    category: 'api',
    description: 'Resource already exists',
    messageTemplate: '{resource} already exists: {name}',
    cause: 'A create call used a name that is already taken.',
    resolution: 'Use getOrCreateCollection, or pick another name.',
  },
  {
    errorId: 'VS-A003',
    category: 'api',
    description: 'Authentication failed',
    messageTemplate: 'authentication failed ({status})',
    cause: 'The server rejected the auth token or it is missing.',
    resolution: 'Set apiKey or VECTORSCOPE_API_KEY to a valid token.',
  },
  {
    errorId: 'VS-A004',
    category: 'api',
    description: 'Rate limit exceeded',
    messageTemplate: 'rate limit exceeded after {retries} retries',
    cause: 'The server kept answering 429 through every retry.',
    resolution: 'Reduce request rate or maxConcurrent.',
  },
  {
    errorId: 'VS-A005',
    category: 'api',
    description: 'HTTP error status',
    messageTemplate: '{method} {path}: HTTP {status} — {body}',
    cause: 'The server answered with an error status not mapped to a narrower error.',
    resolution: 'Inspect the status and body in the message.',
  },
  {
    errorId: 'VS-A006',
    category: 'api',
    description: 'Invalid response',
    messageTemplate: '{source}: invalid response — {reason}',
    cause: 'The server answered with a body the client cannot interpret.',
    resolution: 'Check that the server speaks the v2 REST surface.',
  },
  {
    errorId: 'VS-A007',
    category: 'api',
    description: 'Batch partially failed',
    messageTemplate: '{operation}: {failed} of {total} items failed',
    cause: 'The server applied some items of a batch and rejected others.',
    resolution: 'Inspect BatchError.items for the per-item status.',
  },
];

/**
 * Global error registry instance.
 * Read-only singleton initialized at module load.
 */
export const ERROR_REGISTRY: ErrorRegistry = new ErrorRegistryImpl(
  ERROR_DEFINITIONS
);

// ============================================================
// TEMPLATE RENDERING
// ============================================================

/**
 * Renders a message template by replacing placeholders with context values.
 *
 * Placeholder format: {varName}
 * Missing context values render as empty string.
 * Non-string values are coerced via String().
 * Invalid templates (unclosed braces) return template unchanged.
 *
 * @param template - Template string with {placeholder} syntax
 * @param context - Key-value pairs for placeholder replacement
 * @returns Rendered message with placeholders replaced
 *
 * @example
 * renderMessage("{resource} not found: {name}", {resource: "collection", name: "docs"})
 * // Returns: "collection not found: docs"
 */
export function renderMessage(
  template: string,
  context: Record<string, unknown>
): string {
  let result = '';
  let i = 0;

  while (i < template.length) {
    const char = template.charAt(i);

    if (char === '{') {
      const end = template.indexOf('}', i + 1);

      // Unclosed brace - return template unchanged
      if (end === -1) {
        return template;
      }

      const value = context[template.slice(i + 1, end)];
      if (value !== undefined) {
        result += String(value);
      }

      i = end + 1;
      continue;
    }

    result += char;
    i++;
  }

  return result;
}
