/**
 * Minimal in-process HTTP server speaking the subset of the Ollama API the
 * client uses. Routes are plain handlers so each test can script answers.
 */

import http from "http";

export interface RecordedRequest {
  method: string;
  path: string;
  body: unknown;
}

export interface FakeAnswer {
  status: number;
  body: unknown;
  // Hold the whole response, headers included, this long
  delayMs?: number;
}

export type FakeRoute = (body: unknown) => FakeAnswer | "hangup";

export class FakeOllamaServer {
  readonly requests: RecordedRequest[] = [];
  routes: Record<string, FakeRoute> = {};
  private server = http.createServer((req, res) => this.handle(req, res));
  private timers = new Set<NodeJS.Timeout>();

  async start(): Promise<string> {
    await new Promise<void>((resolve) => this.server.listen(0, "127.0.0.1", resolve));
    const address = this.server.address();
    if (!address || typeof address === "string") throw new Error("fake server has no TCP address");
    return `http://127.0.0.1:${address.port}`;
  }

  async stop(): Promise<void> {
    this.timers.forEach((timer) => clearTimeout(timer));
    this.timers.clear();
    this.server.closeAllConnections();
    await new Promise<void>((resolve, reject) => this.server.close((err) => (err ? reject(err) : resolve())));
  }

  private handle(req: http.IncomingMessage, res: http.ServerResponse): void {
    const chunks: Buffer[] = [];
    req.on("data", (chunk: Buffer) => chunks.push(chunk));
    req.on("end", () => {
      const raw = Buffer.concat(chunks).toString("utf8");
      const body: unknown = raw ? JSON.parse(raw) : undefined;
      const key = `${req.method} ${req.url}`;
      this.requests.push({ method: req.method ?? "", path: req.url ?? "", body });

      const route = this.routes[key];
      if (!route) {
        res.writeHead(404, { "Content-Type": "text/plain" });
        res.end("404 page not found");
        return;
      }

      const answer = route(body);
      if (answer === "hangup") {
        // Promise a long body, send part of it, then drop the socket
        res.writeHead(200, { "Content-Type": "application/json", "Content-Length": "1000" });
        res.write('{"response":"partial');
        res.socket?.destroy();
        return;
      }
      if (answer.delayMs === undefined) {
        this.reply(res, answer);
        return;
      }
      const timer = setTimeout(() => {
        this.timers.delete(timer);
        this.reply(res, answer);
      }, answer.delayMs);
      this.timers.add(timer);
    });
  }

  private reply(res: http.ServerResponse, answer: FakeAnswer): void {
    res.writeHead(answer.status, { "Content-Type": "application/json" });
    res.end(typeof answer.body === "string" ? answer.body : JSON.stringify(answer.body));
  }
}
