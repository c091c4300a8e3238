import { z } from 'zod';
import { COMPONENT_KINDS, ComponentSchemas, parseComponentData } from '@postcraft/composer';
import { defineTool, type Tool } from '../tool.js';
import { draftIdArg, type ToolContext } from './context.js';

/** One `add_<kind>` tool per component kind. Fields are checked against the
 * kind's schema; content rules apply later, at compose time. */
export function componentTools({ drafts }: ToolContext): Tool[] {
  return COMPONENT_KINDS.map((kind) =>
    defineTool(`add_${kind}`, {
      description: `Add a ${kind.replace(/_/g, ' ')} component to a draft (the current draft by default)`,
      input: z.object({ draftId: draftIdArg }).passthrough(),
      advertise: ComponentSchemas[kind],
      run: async ({ draftId, ...fields }) => {
        const draft = await drafts.addComponent(parseComponentData({ ...fields, kind }), draftId);
        return { draftId: draft.draftId, index: draft.content.components.length - 1, kind };
      },
    }),
  );
}
