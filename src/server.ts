import express from 'express';
import open from 'open';
import { readFile } from 'fs/promises';
import { join, normalize } from 'path';
import type { Server } from 'http';
import { WebSocketServer, WebSocket } from 'ws';

export interface PreviewServer {
  server: Server;
  url: string;
  /** Tell every connected browser to reload. */
  broadcastRefresh: () => void;
  close: () => Promise<void>;
}

export const RELOAD_SCRIPT = `<script>
(function () {
  var ws = new WebSocket('ws://' + location.host);
  ws.onmessage = function (event) {
    if (JSON.parse(event.data).type === 'refresh') location.reload();
  };
})();
</script>`;

/**
 * Insert the live-reload client before `</body>`, or append it when the page
 * has no closing body tag.
 */
export function injectReloadScript(html: string): string {
  const index = html.lastIndexOf('</body>');
  if (index === -1) {
    return html + RELOAD_SCRIPT;
  }
  return html.slice(0, index) + RELOAD_SCRIPT + html.slice(index);
}

export function createPreviewApp(htmlDir: string): express.Express {
  const app = express();

  // HTML pages get the reload client; everything else is served as-is
  app.get(/(\/|\.html)$/, async (req, res, next) => {
    const requested = req.path.endsWith('/') ? `${req.path}index.html` : req.path;
    const filePath = join(htmlDir, normalize(requested));

    if (!filePath.startsWith(htmlDir)) {
      res.status(403).end();
      return;
    }

    try {
      const html = await readFile(filePath, 'utf-8');
      res.type('html').send(injectReloadScript(html));
    } catch {
      next();
    }
  });

  app.use(express.static(htmlDir));

  return app;
}

export function startPreviewServer(
  htmlDir: string,
  port: number = 8000,
  shouldOpen: boolean = true
): Promise<PreviewServer> {
  const app = createPreviewApp(htmlDir);

  return new Promise((resolve, reject) => {
    const server = app.listen(port, '127.0.0.1', () => {
      const url = `http://127.0.0.1:${port}`;
      console.error(`\n[Server] Documentation preview running at ${url}`);
      console.error('[Server] Press Ctrl+C to stop\n');

      const wss = new WebSocketServer({ server });

      wss.on('connection', (ws) => {
        console.error('[Server] Browser connected');
        ws.on('close', () => {
          console.error('[Server] Browser disconnected');
        });
      });

      const broadcastRefresh = (): void => {
        wss.clients.forEach((client) => {
          if (client.readyState === WebSocket.OPEN) {
            client.send(JSON.stringify({ type: 'refresh' }));
          }
        });
      };

      const close = (): Promise<void> =>
        new Promise((done, fail) => {
          wss.close();
          server.close((err) => (err ? fail(err) : done()));
        });

      if (shouldOpen) {
        open(url).catch((err: unknown) => {
          console.error(`[Server] Could not open browser: ${err}`);
        });
      }

      resolve({ server, url, broadcastRefresh, close });
    });

    server.on('error', reject);
  });
}
