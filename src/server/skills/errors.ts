import type { DescriptorErrorCode, ScanFileError } from "./types";

export abstract class DescriptorError extends Error {
  abstract readonly code: DescriptorErrorCode;

  toScanError(filePath: string): ScanFileError {
    return { path: filePath, code: this.code, message: this.message };
  }
}

export class MalformedHeaderError extends DescriptorError {
  readonly name = "MalformedHeaderError";
  readonly code = "MalformedHeaderError";
}

export class MissingFieldError extends DescriptorError {
  readonly name = "MissingFieldError";
  readonly code = "MissingFieldError";

  constructor(readonly field: string) {
    super(`Frontmatter.${field} is required`);
  }
}

export class InvalidNameError extends DescriptorError {
  readonly name = "InvalidNameError";
  readonly code = "InvalidNameError";
}

export class EmptyCategoriesError extends DescriptorError {
  readonly name = "EmptyCategoriesError";
  readonly code = "EmptyCategoriesError";
}

export class NameMismatchError extends DescriptorError {
  readonly name = "NameMismatchError";
  readonly code = "NameMismatchError";

  constructor(
    readonly expected: string,
    readonly declared: string
  ) {
    super(
      `Frontmatter.name must match its location (expected "${expected}", got "${declared}")`
    );
  }
}

export class MissingDescriptorError extends DescriptorError {
  readonly name = "MissingDescriptorError";
  readonly code = "MissingDescriptorError";
}

export class UnreadableFileError extends DescriptorError {
  readonly name = "UnreadableFileError";
  readonly code = "UnreadableFileError";
}

export class DescriptorTooLargeError extends DescriptorError {
  readonly name = "DescriptorTooLargeError";
  readonly code = "DescriptorTooLargeError";
}

export class RootUnreadableError extends Error {
  readonly name = "RootUnreadableError";
}

export class SkillNotFoundError extends Error {
  readonly name = "SkillNotFoundError";
}

export class ResourceAccessError extends Error {
  readonly name = "ResourceAccessError";
}
