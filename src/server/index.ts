import http from "http";
import { GatewayLogger } from "../core/logger";
import { createHttpServer, HttpServerDeps } from "./http";

export interface StartServerOptions extends HttpServerDeps {
  host: string;
  port: number;
}

/**
 * Listen on host:port. Resolves once the socket is bound; rejects on
 * listen errors such as EADDRINUSE.
 */
export function startServer(options: StartServerOptions): Promise<http.Server> {
  const { host, port, logger } = options;
  const server = http.createServer(createHttpServer(options));

  return new Promise((resolve, reject) => {
    const onError = (error: NodeJS.ErrnoException) => {
      if (error.code === "EADDRINUSE") {
        logger.fatal(`Port ${port} is already in use`, { port });
      }
      reject(error);
    };

    server.once("error", onError);
    server.listen(port, host, () => {
      server.off("error", onError);
      server.on("error", (error) => logger.error(error));
      logListening(logger, server);
      resolve(server);
    });
  });
}

export function stopServer(server: http.Server): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close((error) => (error ? reject(error) : resolve()));
  });
}

function logListening(logger: GatewayLogger, server: http.Server): void {
  const address = server.address();
  const where = typeof address === "string" ? address : address ? `${address.address}:${address.port}` : "unknown";
  logger.info(`Gateway listening on ${where}`, {
    endpoints: ["GET /", "GET /health", "GET /models", "POST /generate", "POST /ask"],
  });
}
