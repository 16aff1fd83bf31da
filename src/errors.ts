import type { ValidationIssue } from './types';

export class SkillGraphError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** A metadata file, instructions file, include target or referenced unit is missing. */
export class NotFoundError extends SkillGraphError {
  constructor(message: string, readonly path: string) {
    super(message);
  }
}

export class ParseError extends SkillGraphError {
  constructor(
    message: string,
    readonly path?: string,
    readonly issues: string[] = [],
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

/** Raised only by loaders that gate on validation; the validator itself reports. */
export class ValidationError extends SkillGraphError {
  constructor(message: string, readonly issues: readonly ValidationIssue[]) {
    super(message);
  }
}

export class TemplateError extends SkillGraphError {
  constructor(message: string, readonly source: string, options?: { cause?: unknown }) {
    super(message, options);
  }
}

/** A unit cannot be built from the variables it was given. */
export class BuildError extends SkillGraphError {
  constructor(message: string, readonly unitName: string, options?: { cause?: unknown }) {
    super(message, options);
  }
}

export class CyclicReferenceError extends SkillGraphError {
  constructor(readonly chain: string[]) {
    super(`Cyclic sub-agent reference: ${chain.join(' -> ')}`);
  }
}

export class ConfigError extends SkillGraphError {
  constructor(message: string, readonly path?: string, options?: { cause?: unknown }) {
    super(message, options);
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
