import http from "node:http";
import { createReadStream, existsSync, statSync } from "node:fs";
import { createRequire } from "node:module";
import { dirname, join, resolve } from "node:path";
import { WebSocketServer, WebSocket } from "ws";
import { createLogger, type Logger } from "./logger.js";
import { buildFigure, type Renderer } from "./renderer.js";
import type { Figure } from "./schema.js";
import type { SeriesView } from "./series-store.js";
import { nowMs } from "./util.js";

export type ServerStatus = Record<string, unknown>;

type ServerOptions = {
  port: number;
  host?: string;
  publicDir: string;
  uplotDir?: string;
  title: string;
  colors: Map<string, string>;
  status?: () => ServerStatus;
  logger?: Logger;
};

export type FigureClient = {
  readonly readyState: number;
  send(data: string): void;
};

const UPLOT_PREFIX = "/vendor/uplot/";

// The page loads uPlot's browser bundle and stylesheet from the installed package.
export function uplotDistDir(): string {
  return dirname(createRequire(import.meta.url).resolve("uplot"));
}

export class TrendServer implements Renderer {
  readonly name = "dashboard";
  private clients: Set<FigureClient> = new Set();
  private server?: http.Server;
  private wss?: WebSocketServer;
  private lastFigure: Figure | null = null;
  private startedAt = nowMs();
  private logger: Logger;

  constructor(private options: ServerOptions) {
    this.logger = options.logger ?? createLogger("dashboard");
  }

  start(): Promise<number> {
    this.server = http.createServer(this.handleRequest.bind(this));
    this.wss = new WebSocketServer({ noServer: true });

    this.server.on("upgrade", (req, socket, head) => {
      const url = req.url ?? "";
      if (url.startsWith("/ws/figure")) {
        this.wss?.handleUpgrade(req, socket, head, (ws) => {
          this.addClient(ws);
          ws.on("close", () => this.clients.delete(ws));
          ws.on("error", (err) => this.logger.warn(`client error: ${err.message}`));
        });
        return;
      }
      socket.destroy();
    });

    const server = this.server;
    return new Promise((resolvePort, reject) => {
      server.once("error", reject);
      server.listen(this.options.port, this.options.host, () => {
        server.off("error", reject);
        const addr = server.address();
        resolvePort(typeof addr === "object" && addr ? addr.port : this.options.port);
      });
    });
  }

  stop() {
    for (const ws of this.wss?.clients ?? []) ws.terminate();
    this.clients.clear();
    this.wss?.close();
    this.server?.close();
  }

  close() {
    this.stop();
  }

  addClient(client: FigureClient) {
    this.clients.add(client);
    if (this.lastFigure) client.send(JSON.stringify({ type: "figure", figure: this.lastFigure }));
  }

  getClientCount(): number {
    return this.clients.size;
  }

  getLastFigure(): Figure | null {
    return this.lastFigure;
  }

  render(view: SeriesView) {
    const figure = buildFigure(view, this.options.colors, this.options.title);
    this.lastFigure = figure;
    const payload = JSON.stringify({ type: "figure", figure });
    for (const ws of this.clients) {
      if (ws.readyState === WebSocket.OPEN) ws.send(payload);
    }
  }

  private handleRequest(req: http.IncomingMessage, res: http.ServerResponse) {
    const url = new URL(req.url ?? "/", `http://${req.headers.host ?? "localhost"}`);
    if (url.pathname === "/health") {
      return this.respondJson(res, {
        ok: true,
        uptime_ms: nowMs() - this.startedAt,
        clients: this.clients.size,
        ...(this.options.status?.() ?? {}),
      });
    }
    if (url.pathname === "/api/figure") {
      return this.respondJson(res, this.lastFigure ?? { title: this.options.title, t: nowMs(), window: { start: null, end: null, length: 0 }, panels: [] });
    }
    if (url.pathname.startsWith(UPLOT_PREFIX)) {
      const dir = this.options.uplotDir ?? uplotDistDir();
      return this.serveStatic(res, dir, url.pathname.slice(UPLOT_PREFIX.length));
    }
    if (url.pathname === "/" || url.pathname === "/index.html") {
      return this.serveStatic(res, this.options.publicDir, "index.html");
    }
    return this.serveStatic(res, this.options.publicDir, url.pathname.slice(1));
  }

  private respondJson(res: http.ServerResponse, payload: unknown) {
    const body = JSON.stringify(payload);
    res.writeHead(200, {
      "Content-Type": "application/json",
      "Access-Control-Allow-Origin": "*",
      "Cache-Control": "no-store",
    });
    res.end(body);
  }

  private serveStatic(res: http.ServerResponse, root: string, relPath: string) {
    const safePath = relPath.replace(/^\/+/, "");
    const abs = resolve(join(root, safePath));
    if (!abs.startsWith(resolve(root))) {
      res.writeHead(403);
      res.end("Forbidden");
      return;
    }
    if (!existsSync(abs) || statSync(abs).isDirectory()) {
      res.writeHead(404);
      res.end("Not found");
      return;
    }
    const ext = abs.split(".").pop() ?? "";
    const contentType =
      ext === "html" ? "text/html" :
      ext === "js" ? "application/javascript" :
      ext === "css" ? "text/css" :
      "application/octet-stream";
    res.writeHead(200, { "Content-Type": contentType });
    createReadStream(abs).pipe(res);
  }
}
