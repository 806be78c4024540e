/**
 * Shared validation helpers for YouTube Data API request parameters.
 */
import { z } from "zod";
import { invalidParams, missingParams } from "../youtube/errors.js";
import {
  RESOURCE_PARTS,
  createResourcePartsMapping,
  type ResourcePartsMapping,
} from "../youtube/resource-parts.js";
import { logger } from "./logger.js";

/**
 * Accepted shapes for a multi-valued parameter: an already comma-joined
 * string, an ordered list of tokens, or a set of tokens.
 */
export const fieldValueSchema = z.union([
  z.string(),
  z.array(z.string()),
  z.set(z.string()),
]);

export type FieldValue = z.infer<typeof fieldValueSchema>;

function isPresent(value: unknown): boolean {
  return value !== undefined && value !== null;
}

/**
 * Narrow a present caller value to a `FieldValue`, or reject it as a bad
 * param named `field`.
 */
function parseFieldValue(field: string, value: unknown): FieldValue {
  const parsed = fieldValueSchema.safeParse(value);
  if (!parsed.success) {
    throw invalidParams(
      `Parameter (${field}) must be single str,comma-separated str,list,tuple or set`,
    );
  }
  return parsed.data;
}

export class ParamsValidator {
  private readonly resourceParts: ResourcePartsMapping;

  constructor(resourceParts: ResourcePartsMapping) {
    this.resourceParts = resourceParts;
  }

  /**
   * Validate that every present param is a string that can be split on
   * commas.
   */
  commaSeparatedValidator(params: Record<string, unknown>): void {
    for (const [name, value] of Object.entries(params)) {
      if (isPresent(value) && typeof value !== "string") {
        throw invalidParams(
          `Parameter ${name} must be str or comma-separated list str`,
        );
      }
    }
  }

  /**
   * Validate that the resource supports every comma-separated part.
   * Absent parts are accepted as-is.
   */
  partsValidator(resource: string, parts?: string | null): void {
    if (parts === undefined || parts === null) return;
    this.checkParts(resource, new Set(parts.split(",")), "Part");
  }

  /**
   * Validate that exactly one of the given params is present.
   */
  incompatibleValidator(params: Record<string, unknown>): void {
    const names = Object.keys(params).join(",");
    const given = Object.values(params).filter(isPresent).length;
    if (given === 0) {
      throw missingParams(`Specify at least one of ${names}`);
    }
    if (given > 1) {
      throw invalidParams(`Incompatible parameters specified for ${names}`);
    }
  }

  /**
   * Normalize a multi-valued param to the comma-joined string the API
   * expects. Returns null when the value is absent.
   */
  enfCommaSeparated(field: string, value: unknown): string | null {
    if (!isPresent(value)) return null;

    const data = parseFieldValue(field, value);
    if (typeof data === "string") return data;
    if (data instanceof Set) {
      logger.warn({ field }, "Note: The order of the set is unreliable.");
    }
    return [...data].join(",");
  }

  /**
   * Resolve the `part` param for a resource, defaulting to every part it
   * supports, and reject parts it does not.
   */
  enfParts(resource: string, value: unknown): string {
    let requested: ReadonlySet<string>;
    if (!isPresent(value)) {
      requested = this.supportedParts(resource);
    } else {
      const data = parseFieldValue("parts", value);
      requested =
        typeof data === "string" ? new Set(data.split(",")) : new Set(data);
    }

    this.checkParts(resource, requested, "Parts");
    return [...requested].join(",");
  }

  /**
   * Permitted parts for a resource; an unknown resource is a bad param,
   * not a lookup failure.
   */
  supportedParts(resource: string): ReadonlySet<string> {
    const parts = this.resourceParts.get(resource);
    if (!parts) {
      throw invalidParams(`Resource ${resource} not support`);
    }
    return parts;
  }

  private checkParts(
    resource: string,
    requested: ReadonlySet<string>,
    label: "Part" | "Parts",
  ): void {
    const supported = this.supportedParts(resource);
    const unsupported = [...requested].filter((p) => !supported.has(p));
    if (unsupported.length > 0) {
      throw invalidParams(
        `${label} ${unsupported.join(",")} for resource ${resource} not support`,
      );
    }
  }
}

let defaultValidator: ParamsValidator | undefined;

/**
 * Validator over `RESOURCE_PARTS`, built on first use.
 */
export function getDefaultParamsValidator(): ParamsValidator {
  defaultValidator ??= new ParamsValidator(
    createResourcePartsMapping(RESOURCE_PARTS),
  );
  return defaultValidator;
}

export function commaSeparatedValidator(params: Record<string, unknown>): void {
  getDefaultParamsValidator().commaSeparatedValidator(params);
}

export function partsValidator(resource: string, parts?: string | null): void {
  getDefaultParamsValidator().partsValidator(resource, parts);
}

export function incompatibleValidator(params: Record<string, unknown>): void {
  getDefaultParamsValidator().incompatibleValidator(params);
}

export function enfCommaSeparated(field: string, value: unknown): string | null {
  return getDefaultParamsValidator().enfCommaSeparated(field, value);
}

export function enfParts(resource: string, value: unknown): string {
  return getDefaultParamsValidator().enfParts(resource, value);
}
