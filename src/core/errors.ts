/**
 * semsync error types with exit code integration.
 *
 * Failures local to one tool or one project are reported per scope by the
 * engine; only failures on the shared global record abort a batch.
 */

import type { SemanticRole } from './types.js';

export enum ExitCode {
  SUCCESS = 0,
  GENERAL_ERROR = 1,
  NOT_FOUND = 4,
  VALIDATION_ERROR = 6,
  CONFIG_ERROR = 7,
  LOCK_TIMEOUT = 8,
  PLUGIN_DISCOVERY = 20,
  ROLE_CONFLICT = 21,
  CONFIG_CONFLICT = 22,
  PERSISTENCE = 23,
  USER_ABORT = 30,
}

/**
 * Structured error for semsync operations.
 * Carries an exit code, a human-readable message and an optional fix hint.
 */
export class SemsyncError extends Error {
  readonly code: ExitCode;
  readonly fix?: string;

  constructor(
    code: ExitCode,
    message: string,
    options?: { fix?: string; cause?: unknown },
  ) {
    super(message, { cause: options?.cause });
    this.name = 'SemsyncError';
    this.code = code;
    this.fix = options?.fix;
  }

  toJSON(): Record<string, unknown> {
    return {
      success: false,
      error: {
        code: this.code,
        name: this.name,
        message: this.message,
        ...(this.fix && { fix: this.fix }),
      },
    };
  }
}

/** One tool's discovery failed; other tools keep going */
export class PluginDiscoveryError extends SemsyncError {
  readonly tool: string;

  constructor(tool: string, message: string, options?: { cause?: unknown }) {
    super(ExitCode.PLUGIN_DISCOVERY, `Discovery failed for ${tool}: ${message}`, options);
    this.name = 'PluginDiscoveryError';
    this.tool = tool;
  }
}

export class RoleConflictError extends SemsyncError {
  readonly entityId: string;
  readonly existingRole: SemanticRole;
  readonly requestedRole: SemanticRole;

  constructor(entityId: string, existingRole: SemanticRole, requestedRole: SemanticRole) {
    super(
      ExitCode.ROLE_CONFLICT,
      `Entity "${entityId}" is registered as ${existingRole}, cannot be used as ${requestedRole}`,
      { fix: `Create a new entity for the ${requestedRole} meaning instead of reusing "${entityId}".` },
    );
    this.name = 'RoleConflictError';
    this.entityId = entityId;
    this.existingRole = existingRole;
    this.requestedRole = requestedRole;
  }
}

/** Concurrent create of the same entity id, or an id that already exists */
export class ConfigConflictError extends SemsyncError {
  readonly entityId: string;

  constructor(entityId: string, message?: string) {
    super(
      ExitCode.CONFIG_CONFLICT,
      message ?? `Entity "${entityId}" was registered concurrently`,
      { fix: `Accept the existing entity "${entityId}" instead of creating it.` },
    );
    this.name = 'ConfigConflictError';
    this.entityId = entityId;
  }
}

/** Compare-and-set failed: the record moved on since it was read */
export class StaleRecordError extends SemsyncError {
  readonly record: string;
  readonly expectedVersion: number;
  readonly actualVersion: number;

  constructor(record: string, expectedVersion: number, actualVersion: number) {
    super(
      ExitCode.CONFIG_CONFLICT,
      `Record ${record} is at version ${actualVersion}, expected ${expectedVersion}`,
    );
    this.name = 'StaleRecordError';
    this.record = record;
    this.expectedVersion = expectedVersion;
    this.actualVersion = actualVersion;
  }
}

export class PersistenceError extends SemsyncError {
  readonly record: string;
  /** Message without the record name */
  readonly reason: string;

  constructor(record: string, reason: string, options?: { cause?: unknown }) {
    super(ExitCode.PERSISTENCE, `${reason}: ${record}`, {
      fix: 'Another process may be writing the configuration. Wait and retry.',
      cause: options?.cause,
    });
    this.name = 'PersistenceError';
    this.record = record;
    this.reason = reason;
  }
}

export class UserAbortError extends SemsyncError {
  constructor(message = 'Decision collection was cancelled') {
    super(ExitCode.USER_ABORT, message);
    this.name = 'UserAbortError';
  }
}

export class ValidationError extends SemsyncError {
  constructor(message: string, options?: { fix?: string; cause?: unknown }) {
    super(ExitCode.VALIDATION_ERROR, message, options);
    this.name = 'ValidationError';
  }
}

export class NotFoundError extends SemsyncError {
  constructor(message: string, options?: { fix?: string }) {
    super(ExitCode.NOT_FOUND, message, options);
    this.name = 'NotFoundError';
  }
}

export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
