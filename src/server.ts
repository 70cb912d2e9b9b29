/**
 * Social Graph API Server
 * Serves the MCP tool surface over HTTP.
 */
import * as http from 'http';
import { initSocialGraph } from './index';
import { McpRequestSchema } from './modules/mcp-service';

function startServer() {
  console.log('🔄 Building social graph...');
  const app = initSocialGraph();
  const graph = app.registry.current();
  console.log(`✅ Graph ready: ${graph.nodeCount} nodes, ${graph.edgeCount} edges`);

  const server = http.createServer(async (req, res) => {
    const url = new URL(req.url || '/', `http://localhost:${app.config.port}`);

    res.setHeader('Content-Type', 'application/json');
    res.setHeader('Access-Control-Allow-Origin', '*');
    res.setHeader('Access-Control-Allow-Methods', 'POST, GET, OPTIONS');
    res.setHeader('Access-Control-Allow-Headers', 'Content-Type');

    if (req.method === 'OPTIONS') { res.writeHead(204); res.end(); return; }

    try {
      if (url.pathname === '/mcp' && req.method === 'POST') {
        const body = McpRequestSchema.safeParse(await readBody(req));
        if (!body.success) {
          res.writeHead(400);
          res.end(JSON.stringify({ error: 'Invalid JSON-RPC request' }));
          return;
        }
        const result = await app.mcpService.handleRequest(body.data);
        res.writeHead(200);
        res.end(JSON.stringify(result));
        return;
      }

      if (url.pathname === '/health') {
        const current = app.registry.current();
        res.writeHead(200);
        res.end(JSON.stringify({
          status: 'ok',
          uptime: process.uptime(),
          generation: app.registry.generation,
          nodes: current.nodeCount,
          edges: current.edgeCount,
        }));
        return;
      }

      res.writeHead(404);
      res.end(JSON.stringify({ error: 'Not Found' }));
    } catch (e) {
      console.error('❌ Request failed:', e);
      res.writeHead(500);
      res.end(JSON.stringify({ error: String(e) }));
    }
  });

  server.listen(app.config.port, () => {
    console.log(`🚀 Social Graph Server running on port ${app.config.port}`);
  });
}

function readBody(req: http.IncomingMessage): Promise<unknown> {
  return new Promise((resolve, reject) => {
    let data = '';
    req.on('data', (chunk) => (data += chunk));
    req.on('end', () => {
      try {
        resolve(data ? JSON.parse(data) : {});
      } catch (e) {
        reject(e);
      }
    });
    req.on('error', reject);
  });
}

try {
  startServer();
} catch (e) {
  console.error('❌ Server failed to start:', e);
  process.exit(1);
}
