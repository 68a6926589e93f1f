// Descriptor → argument validator (zod) and descriptor → provider JSON Schema

import { z } from "zod";
import type { ParameterSpec, ToolDefinition, ToolDescriptor } from "./types/tool";
import { ToolInvocationError, type Result, ok, err } from "./types/errors";

export type ArgumentSchema = z.AnyZodObject;

function fieldSchema(name: string, spec: ParameterSpec): z.ZodTypeAny {
  switch (spec.type) {
    case "string": {
      const allowed = spec.enum;
      if (allowed && allowed.length > 0) {
        return z.string().refine((value) => allowed.includes(value), {
          message: `"${name}" must be one of: ${allowed.join(", ")}`,
        });
      }
      return z.string();
    }
    case "integer":
      return z.number().int();
    case "number":
      return z.number().finite();
    case "boolean":
      return z.boolean();
  }
}

/** Compile a descriptor's parameters into a zod object. Unknown keys are stripped. */
export function compileArgumentSchema(descriptor: ToolDescriptor): ArgumentSchema {
  const shape: Record<string, z.ZodTypeAny> = {};
  for (const [name, spec] of Object.entries(descriptor.parameters)) {
    const field = fieldSchema(name, spec);
    shape[name] = spec.required ? field : field.optional();
  }
  return z.object(shape);
}

/**
 * Validate raw oracle arguments. `null` is treated as "not provided" since
 * models often fill optional slots with null.
 */
export function validateArguments(
  descriptor: ToolDescriptor,
  schema: ArgumentSchema,
  args: Record<string, unknown>,
): Result<Record<string, unknown>, ToolInvocationError> {
  const present = Object.fromEntries(Object.entries(args).filter(([, v]) => v !== null));
  const parsed = schema.safeParse(present);
  if (parsed.success) return ok(parsed.data);

  const issue = parsed.error.issues[0];
  const parameter = String(issue?.path[0] ?? "");
  const spec = descriptor.parameters[parameter];

  if (issue?.code === "invalid_type" && issue.received === "undefined") {
    return err(
      new ToolInvocationError(
        `Missing required parameter "${parameter}" for tool "${descriptor.name}"`,
        "MissingParameter",
        descriptor.name,
        parameter,
      ),
    );
  }

  const expected = spec ? spec.type : "a declared parameter";
  return err(
    new ToolInvocationError(
      `Invalid value for parameter "${parameter}" of tool "${descriptor.name}": expected ${expected}` +
        (issue ? ` (${issue.message})` : ""),
      "InvalidParameterType",
      descriptor.name,
      parameter,
    ),
  );
}

/** JSON Schema form of a descriptor for native function-calling providers. */
export function toToolDefinition(descriptor: ToolDescriptor): ToolDefinition {
  const properties: Record<string, Record<string, unknown>> = {};
  const required: string[] = [];

  for (const [name, spec] of Object.entries(descriptor.parameters)) {
    properties[name] = {
      type: spec.type,
      description: spec.description,
      ...(spec.enum && { enum: [...spec.enum] }),
    };
    if (spec.required) required.push(name);
  }

  return {
    name: descriptor.name,
    description: `${descriptor.description} Returns: ${descriptor.returns}`,
    parameters: {
      type: "object",
      properties,
      ...(required.length > 0 && { required }),
    },
  };
}

/** One-line parameter summary used in prompt-based tool catalogs. */
export function describeParameters(descriptor: ToolDescriptor): string {
  const entries = Object.entries(descriptor.parameters);
  if (entries.length === 0) return "none";
  return entries
    .map(([name, spec]) => {
      const flags = [spec.type, spec.required ? "required" : "optional"];
      const values = spec.enum ? ` One of: ${spec.enum.join(", ")}.` : "";
      return `${name} (${flags.join(", ")}): ${spec.description}${values}`;
    })
    .join("; ");
}
