import type { z } from "zod";
import { asError } from "../errors.js";
import type { CallDefinition, CatalogEntry, PreparedCall } from "./types.js";

export function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length ? issue.path.join(".") : "arguments"}: ${issue.message}`)
    .join("; ");
}

/**
 * Bind a typed call definition into a registry entry. Validation and code
 * building happen in `prepare`; the mutation only runs when the returned
 * `apply` is invoked.
 */
export function defineCall<S extends z.ZodTypeAny>(def: CallDefinition<S>): CatalogEntry {
  return {
    name: def.name,
    declaration: {
      type: "function",
      function: { name: def.name, description: def.description, parameters: def.parameters },
    },
    schema: def.schema,
    prepare(rawArgs, session): PreparedCall {
      const parsed = def.schema.safeParse(rawArgs ?? {});
      if (!parsed.success) return { ok: false, error: formatIssues(parsed.error) };
      const args: z.output<S> = parsed.data;

      let built: string | null;
      try {
        built = def.build(args, session);
      } catch (e: unknown) {
        return { ok: false, error: asError(e).message };
      }
      if (built === null) return { ok: true, code: null, apply: () => [] };

      const code = built;
      return { ok: true, code, apply: () => def.mutate(session, args, code) };
    },
  };
}
