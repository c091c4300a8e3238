import express from 'express';
import type { Server } from 'http';
import type { Logger } from '@postcraft/shared';
import { handleToolRequest } from './handler.js';
import type { ToolRegistry } from './registry.js';

/** Express API over the tool registry: discovery plus one POST per tool call */

export function createServer(registry: ToolRegistry, logger: Logger) {
  const app = express();
  app.use(express.json({ limit: '15mb' }));

  // ─── Health ───

  app.get('/health', (_req, res) => {
    res.json({
      status: 'ok',
      uptime: process.uptime(),
      tools: registry.size,
      timestamp: new Date().toISOString(),
    });
  });

  // ─── Tool Discovery ───

  app.get('/api/tools', (_req, res) => {
    const tools = registry.list();
    res.json({ tools, total: tools.length });
  });

  // ─── Tool Calls ───

  app.post('/api/tools/:name', async (req, res) => {
    const { name } = req.params;
    const { status, body } = await handleToolRequest(registry, name, req.body);

    if (status >= 500) {
      logger.error({ tool: name, status, error: body.ok ? undefined : body.error }, 'Tool call failed');
    } else if (status >= 400) {
      logger.warn({ tool: name, status }, 'Tool call rejected');
    } else {
      logger.info({ tool: name }, 'Tool call completed');
    }
    res.status(status).json(body);
  });

  return app;
}

export function startServer(app: ReturnType<typeof createServer>, port: number, logger: Logger): Server {
  return app.listen(port, () => {
    logger.info({ port }, 'Tool server listening');
  });
}
