// src/core/errors/ErrorContext.ts

/**
 * Metadata attached to a runtime error for logs and failure reports.
 */
export interface ErrorContext {
    code?: string;           // Machine-readable error code (e.g., 'UNKNOWN_TARGET')
    operation?: string;      // The operation that failed (e.g., 'execTask')
    suggestion?: string;     // Hint for the module author
    component?: string;      // The runtime component that raised it
    target?: string;         // `module.method` or event name involved
    retryable?: boolean;
    details?: unknown;       // Original error or additional technical context
}
