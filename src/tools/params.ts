/**
 * Parameter binding — checks planner-supplied arguments against a tool's
 * ParameterSpec list before the handler sees them.
 *
 * Each spec list is compiled once into a Zod object schema (cached per list).
 */

import { z } from "zod";
import { isPlainObject } from "../infra/guards.ts";
import type { ParameterSpec, ParamType, ToolArgs } from "./types.ts";

export type UnknownArgumentsPolicy = "passthrough" | "reject";

export type BindResult =
  | { ok: true; args: ToolArgs }
  | { ok: false; issues: string[] };

const TYPE_LABELS: Record<ParamType, string> = {
  string: "a string",
  number: "a number",
  integer: "an integer",
  boolean: "a boolean",
  array: "a list",
  object: "a mapping",
  any: "a value",
};

/**
 * Zod schema for a single parameter value (presence is handled separately).
 */
export function valueSchema(spec: ParameterSpec): z.ZodTypeAny {
  const errors = {
    required_error: `missing required parameter '${spec.name}'`,
    invalid_type_error: `'${spec.name}' must be ${TYPE_LABELS[spec.type]}`,
  };

  let schema: z.ZodTypeAny;
  switch (spec.type) {
    case "string":
      schema = z.string(errors);
      break;
    case "number":
      schema = z.number(errors).finite({ message: `'${spec.name}' must be a finite number` });
      break;
    case "integer":
      schema = z.number(errors).int({ message: `'${spec.name}' must be an integer` });
      break;
    case "boolean":
      schema = z.boolean(errors);
      break;
    case "array":
      schema = z.array(z.unknown(), errors);
      break;
    case "object":
      schema = z.unknown().refine(isPlainObject, { message: errors.invalid_type_error });
      break;
    case "any":
      schema = z.unknown();
      break;
  }

  const allowed = spec.enum;
  if (allowed && allowed.length > 0) {
    schema = schema.refine((value: unknown) => allowed.some((option) => option === value), {
      message: `'${spec.name}' must be one of: ${allowed.map((v) => JSON.stringify(v)).join(", ")}`,
    });
  }

  return schema;
}

const compiled = new WeakMap<readonly ParameterSpec[], Map<UnknownArgumentsPolicy, z.ZodTypeAny>>();

function compile(specs: readonly ParameterSpec[], policy: UnknownArgumentsPolicy): z.ZodTypeAny {
  let byPolicy = compiled.get(specs);
  if (!byPolicy) {
    byPolicy = new Map();
    compiled.set(specs, byPolicy);
  }
  const cached = byPolicy.get(policy);
  if (cached) return cached;

  const shape: Record<string, z.ZodTypeAny> = {};
  for (const spec of specs) {
    const base = valueSchema(spec);
    // null counts as "not supplied" for optional parameters
    shape[spec.name] = spec.required
      ? z.custom<unknown>((v) => v !== undefined && v !== null, {
          message: `missing required parameter '${spec.name}'`,
        }).pipe(base)
      : base.nullable().optional();
  }

  const object = z.object(shape);
  const schema = policy === "reject" ? object.strict() : object.passthrough();
  byPolicy.set(policy, schema);
  return schema;
}

function formatIssue(issue: z.ZodIssue): string {
  if (issue.code === z.ZodIssueCode.unrecognized_keys) {
    return `unknown parameter${issue.keys.length > 1 ? "s" : ""} ${issue.keys.map((k) => `'${k}'`).join(", ")}`;
  }
  return issue.message;
}

/**
 * Validate and bind arguments.
 *
 * - `undefined`/`null` arguments are treated as `{}`
 * - required parameters must be present and non-null
 * - absent optional parameters receive a copy of their default
 * - unknown keys pass through or are rejected depending on policy
 */
export function bindArguments(
  specs: readonly ParameterSpec[],
  args: unknown,
  policy: UnknownArgumentsPolicy = "passthrough",
): BindResult {
  const input = args === undefined || args === null ? {} : args;
  if (!isPlainObject(input)) {
    return { ok: false, issues: ["arguments must be a mapping of parameter names to values"] };
  }

  const parsed = compile(specs, policy).safeParse(input);
  if (!parsed.success) {
    return { ok: false, issues: parsed.error.issues.map(formatIssue) };
  }

  const bound: ToolArgs = isPlainObject(parsed.data) ? { ...parsed.data } : {};
  for (const spec of specs) {
    const value = bound[spec.name];
    if (value === undefined || value === null) {
      if (spec.default !== undefined) {
        bound[spec.name] = structuredClone(spec.default);
      } else {
        delete bound[spec.name];
      }
    }
  }

  return { ok: true, args: bound };
}

/**
 * Problems with a parameter list itself (used at definition time).
 */
export function checkParameterSpecs(specs: readonly ParameterSpec[]): string[] {
  const problems: string[] = [];
  const seen = new Set<string>();

  for (const spec of specs) {
    if (!spec.name || !/^[a-zA-Z_][a-zA-Z0-9_]*$/.test(spec.name)) {
      problems.push(`parameter name "${spec.name}" is not a valid identifier`);
      continue;
    }
    if (seen.has(spec.name)) {
      problems.push(`parameter "${spec.name}" is declared twice`);
    }
    seen.add(spec.name);

    if (spec.default !== undefined) {
      if (spec.required) {
        problems.push(`required parameter "${spec.name}" cannot have a default`);
      } else if (!valueSchema(spec).safeParse(spec.default).success) {
        problems.push(`default of "${spec.name}" is not ${TYPE_LABELS[spec.type]}`);
      }
    }
  }

  return problems;
}
