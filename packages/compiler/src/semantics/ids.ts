/**
 * Shared identifier aliases consumed by the expansion engine and the
 * reference program. Module and package ids are plain strings so hosts can
 * reuse their own path keys (for example `src::shapes`).
 */
export type ModuleId = string;
export type PackageId = string;

/**
 * Monotonic stamp assigned to every declaration in source order. A site only
 * observes declarations whose stamp is lower than its own.
 */
export type DeclarationOrder = number;

export type { SourceSpan } from "../diagnostics/index.js";
