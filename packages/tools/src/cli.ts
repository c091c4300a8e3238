import { loadConfig, createLogger } from '@postcraft/shared';
import { createToolRegistry } from './registry.js';
import { createServer, startServer } from './server.js';
import { createToolContext } from './setup.js';
import { handleToolRequest } from './handler.js';

async function main() {
  const args = process.argv.slice(2);
  const command = args[0];

  if (!command || command === '--help' || command === '-h') {
    printHelp();
    process.exit(0);
  }

  const config = loadConfig();
  const logger = createLogger('postcraft', config.logLevel);
  const context = createToolContext(config, logger);
  const registry = createToolRegistry(context, logger);

  const chalk = (await import('chalk')).default;
  const Table = (await import('cli-table3')).default;

  const print = {
    header: (text: string) => console.log('\n' + chalk.bold.cyan(`  ${text}`)),
    success: (text: string) => console.log(chalk.green(`  ✓ ${text}`)),
    error: (text: string) => console.log(chalk.red(`  ✗ ${text}`)),
    dim: (text: string) => console.log(chalk.dim(`    ${text}`)),
  };

  switch (command) {
    case 'serve': {
      const port = getFlag(args, '--port') ? parseInt(getFlag(args, '--port') ?? '', 10) : config.port;
      startServer(createServer(registry, logger), port, logger);
      print.success(`Serving ${registry.size} tools on http://localhost:${port}`);
      if (config.dryRun) print.dim('Publishing is in dry-run mode (DRY_RUN=false to publish)');
      break;
    }

    case 'tools': {
      print.header('Tools');
      const table = new Table({ head: ['Tool', 'Arguments', 'Description'] });
      for (const tool of registry.list()) {
        const fields = tool.fields.map((f) => (f.required ? f.name : `${f.name}?`)).join(', ');
        table.push([tool.name, fields, tool.description]);
      }
      console.log(table.toString());
      break;
    }

    case 'themes': {
      print.header('Themes');
      const table = new Table({ head: ['Key', 'Tone', 'Goal', 'Frequency', 'Emoji'] });
      for (const key of context.themes.list()) {
        const theme = context.themes.summary(key);
        table.push([key, theme.tone, theme.goal, theme.postFrequency, theme.emojiLevel]);
      }
      console.log(table.toString());
      break;
    }

    case 'call': {
      const name = args[1];
      if (!name) {
        print.error('Usage: postcraft call <tool> [json-arguments]');
        process.exit(1);
      }
      const input: unknown = args[2] ? JSON.parse(args[2]) : {};
      const { status, body } = await handleToolRequest(registry, name, input);
      if (body.ok) {
        console.log(JSON.stringify(body.result, null, 2));
      } else {
        print.error(`${body.error.type} (${status}): ${body.error.message}`);
        for (const issue of body.error.issues ?? []) print.dim(issue);
        process.exit(1);
      }
      break;
    }

    default:
      print.error(`Unknown command: ${command}`);
      printHelp();
      process.exit(1);
  }
}

function getFlag(args: string[], flag: string): string | undefined {
  const idx = args.indexOf(flag);
  return idx !== -1 && idx + 1 < args.length ? args[idx + 1] : undefined;
}

function printHelp() {
  console.log(`
  postcraft — compose LinkedIn posts from components, themes and variants

  Commands:
    serve [--port N]          Start the tool API (GET /api/tools, POST /api/tools/:name)
    tools                     List every tool and its arguments
    themes                    List registered themes
    call <tool> [json]        Run one tool, e.g. call list_variant_axes '{"postType":"text"}'

  Environment: LINKEDIN_ACCESS_TOKEN, LINKEDIN_PERSON_URN, DRY_RUN, DRAFT_STORE, DATABASE_URL, PORT
`);
}

main().catch((err) => {
  console.error(err instanceof Error ? err.message : err);
  process.exit(1);
});
