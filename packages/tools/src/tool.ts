import { z } from 'zod';

export interface ToolField {
  name: string;
  required: boolean;
}

/** A named command: validated arguments in, JSON-serializable result out */
export interface Tool {
  name: string;
  description: string;
  fields: ToolField[];
  invoke(args: unknown): Promise<unknown>;
}

export interface ToolSpec<I extends z.ZodTypeAny> {
  description: string;
  input: I;
  /** Schema whose fields are advertised alongside `input`'s, when `input` is open-ended */
  advertise?: z.ZodTypeAny;
  run(args: z.output<I>): unknown;
}

export function defineTool<I extends z.ZodTypeAny>(name: string, spec: ToolSpec<I>): Tool {
  return {
    name,
    description: spec.description,
    fields: [...describeFields(spec.input), ...(spec.advertise ? describeFields(spec.advertise) : [])],
    async invoke(args) {
      return spec.run(spec.input.parse(args ?? {}));
    },
  };
}

/** Top-level field names of an object schema; `kind` is implied by the tool name */
export function describeFields(schema: z.ZodTypeAny): ToolField[] {
  if (!(schema instanceof z.ZodObject)) return [];
  const shape: Record<string, z.ZodTypeAny> = schema.shape;
  return Object.entries(shape)
    .filter(([name]) => name !== 'kind')
    .map(([name, field]) => ({ name, required: !field.isOptional() }));
}
