import { readFile } from 'fs/promises';
import { VISIBILITIES, createLogger, isOneOf, loadConfig } from '@postcraft/shared';
import { createLinkedInClient } from './factory.js';

const logger = createLogger('publisher', loadConfig().logLevel);

async function main() {
  const [file, visibility = loadConfig().defaultVisibility] = process.argv.slice(2);
  if (!file) {
    logger.error('Usage: publisher <post.txt> [PUBLIC|CONNECTIONS|LOGGED_IN]');
    process.exit(1);
  }
  if (!isOneOf(VISIBILITIES, visibility)) {
    logger.error({ visibility }, `Visibility must be one of ${VISIBILITIES.join(', ')}`);
    process.exit(1);
  }

  const text = (await readFile(file, 'utf-8')).trim();
  const result = await createLinkedInClient(logger).publishText(text, visibility);

  if (!result.ok) {
    logger.error({ error: result.error }, 'Publish failed');
    process.exit(1);
  }
  logger.info({ postId: result.postId, url: result.url }, 'Published');
}

main().catch((err) => {
  logger.error({ err }, 'Publisher CLI failed');
  process.exit(1);
});
