import { z } from 'zod';
import { LookupError, VISIBILITIES } from '@postcraft/shared';
import { IMAGE_MIME_TYPES } from '@postcraft/publisher';
import { defineTool, type Tool } from '../tool.js';
import { draftIdArg, type ToolContext } from './context.js';

export function publishingTools({ drafts, publisher, defaultVisibility = 'PUBLIC' }: ToolContext): Tool[] {
  return [
    defineTool('publish_draft', {
      description: 'Compose a draft and publish it (dry-run unless DRY_RUN=false)',
      input: z.object({
        draftId: draftIdArg,
        visibility: z.enum(VISIBILITIES).optional(),
        optimize: z.boolean().default(true),
      }),
      run: async ({ draftId, visibility = defaultVisibility, optimize }) => {
        const composed = await drafts.compose(draftId, { optimize });
        const result = await publisher.publishText(composed.text, visibility);

        if (result.ok) {
          await drafts.update(composed.draftId, {
            metadata: {
              lastPublished: { postId: result.postId, url: result.url, visibility, dryRun: publisher.dryRun },
            },
          });
        }
        return { draftId: composed.draftId, characterCount: composed.characterCount, dryRun: publisher.dryRun, ...result };
      },
    }),

    defineTool('upload_image', {
      description: `Upload a base64-encoded image (${IMAGE_MIME_TYPES.join(', ')}, up to 10MB)`,
      input: z.object({ data: z.string().base64(), mimeType: z.enum(IMAGE_MIME_TYPES) }),
      run: async ({ data, mimeType }) => ({
        image: await publisher.uploadImage(Buffer.from(data, 'base64'), mimeType),
        dryRun: publisher.dryRun,
      }),
    }),

    defineTool('get_shared_preview', {
      description: 'Read-only view of a draft by its preview token',
      input: z.object({ previewToken: z.string().min(1) }),
      run: async ({ previewToken }) => {
        const draft = await drafts.getByPreviewToken(previewToken);
        if (!draft) throw new LookupError('preview token', previewToken);
        return {
          name: draft.name,
          postType: draft.postType,
          theme: draft.theme,
          composedText: draft.content.composedText ?? null,
          preview: await drafts.preview(draft.draftId),
        };
      },
    }),
  ];
}
