/**
 * Naming scheme parameters, defaults and validation.
 */

import { InvalidSchemeError } from "./errors.js";

export const CASE_OPTIONS = ["preserve", "lower", "upper", "title"] as const;
export type CaseOption = (typeof CASE_OPTIONS)[number];

export const NUMBER_POSITIONS = ["prefix", "suffix"] as const;
export type NumberPosition = (typeof NUMBER_POSITIONS)[number];

export interface NumberingOptions {
  readonly enabled: boolean;
  readonly padding: number;
  readonly start: number;
  readonly step: number;
  readonly position: NumberPosition;
  readonly separator: string;
}

export interface SchemeParams {
  readonly prefix: string;
  readonly suffix: string;
  readonly find: string;
  readonly replace: string;
  readonly caseOption: CaseOption;
  readonly numbering: NumberingOptions;
  /** Replaces the base name. `{name}` is the original base, `{ext}` the original extension. */
  readonly nameTemplate?: string;
}

export type SchemeInput = Partial<Omit<SchemeParams, "numbering">> & {
  numbering?: Partial<NumberingOptions>;
};

export const DEFAULT_NUMBERING: NumberingOptions = Object.freeze({
  enabled: false,
  padding: 2,
  start: 1,
  step: 1,
  position: "suffix",
  separator: "_",
});

export function isCaseOption(value: unknown): value is CaseOption {
  return typeof value === "string" && (CASE_OPTIONS as readonly string[]).includes(value);
}

export function isNumberPosition(value: unknown): value is NumberPosition {
  return typeof value === "string" && (NUMBER_POSITIONS as readonly string[]).includes(value);
}

function checkCount(name: string, value: number): void {
  if (!Number.isInteger(value) || value < 0) {
    throw new InvalidSchemeError(`numbering.${name} must be a non-negative integer, got ${value}`);
  }
}

/**
 * Throws InvalidSchemeError unless the scheme can be used for generation.
 * Runs on every generate call, so values built by hand are covered too.
 */
export function validateScheme(params: SchemeParams): void {
  if (!isCaseOption(params.caseOption)) {
    throw new InvalidSchemeError(`Unknown case option: ${String(params.caseOption)}`);
  }
  const { numbering } = params;
  checkCount("padding", numbering.padding);
  checkCount("start", numbering.start);
  checkCount("step", numbering.step);
  if (!isNumberPosition(numbering.position)) {
    throw new InvalidSchemeError(`Unknown numbering position: ${String(numbering.position)}`);
  }
}

export function createScheme(input: SchemeInput = {}): SchemeParams {
  const scheme: SchemeParams = {
    prefix: input.prefix ?? "",
    suffix: input.suffix ?? "",
    find: input.find ?? "",
    replace: input.replace ?? "",
    caseOption: input.caseOption ?? "preserve",
    numbering: Object.freeze({ ...DEFAULT_NUMBERING, ...input.numbering }),
    ...(input.nameTemplate !== undefined ? { nameTemplate: input.nameTemplate } : {}),
  };
  validateScheme(scheme);
  return Object.freeze(scheme);
}

/** Layer `override` on top of `base`; numbering fields merge individually. */
export function mergeSchemeInput(base: SchemeInput, override: SchemeInput): SchemeInput {
  return {
    ...base,
    ...override,
    numbering: { ...base.numbering, ...override.numbering },
  };
}
