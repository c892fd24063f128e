import http from "node:http";
import { errorMessage } from "./errors";
import { createLogger } from "./logger";

const log = createLogger("callback");

export const CALLBACK_HOST = "127.0.0.1";
export const CALLBACK_PATH = "/callback";

export interface CallbackResponse {
  status: number;
  body: string;
  contentType?: string;
}

export type CallbackHandler = (query: URLSearchParams) => Promise<CallbackResponse>;

export interface CallbackServer {
  readonly port: number;
  readonly redirectUri: string;
  readonly closed: boolean;
  /** Idempotent. */
  close(): Promise<void>;
}

function listen(server: http.Server, port: number): Promise<void> {
  return new Promise((resolve, reject) => {
    const onError = (error: Error): void => {
      server.off("listening", onListening);
      reject(error);
    };
    const onListening = (): void => {
      server.off("error", onError);
      resolve();
    };

    server.once("error", onError);
    server.once("listening", onListening);
    server.listen(port, CALLBACK_HOST);
  });
}

/**
 * Starts a loopback listener that serves exactly one `/callback` request and
 * then shuts itself down. Binds `preferredPort` when it is free so the redirect
 * URI matches the one registered with the provider, otherwise an ephemeral port.
 */
export async function startCallbackServer(preferredPort: number, handler: CallbackHandler): Promise<CallbackServer> {
  let consumed = false;
  let closing: Promise<void> | null = null;

  const server = http.createServer((req, res) => {
    const requestUrl = new URL(req.url ?? "/", `http://${CALLBACK_HOST}`);

    if (req.method !== "GET" || requestUrl.pathname !== CALLBACK_PATH) {
      res.statusCode = 404;
      res.end("Not found");
      return;
    }

    if (consumed) {
      res.statusCode = 410;
      res.end("Callback already handled");
      return;
    }
    consumed = true;

    handler(requestUrl.searchParams)
      .catch((error: unknown): CallbackResponse => {
        log.error(`Callback handler failed: ${errorMessage(error)}`);
        return { status: 500, body: "Login failed" };
      })
      .then((response) => {
        res.statusCode = response.status;
        res.setHeader("Content-Type", response.contentType ?? "text/plain; charset=utf-8");
        res.end(response.body, () => {
          close().catch((error: unknown) => log.warn(`Failed to close callback server: ${errorMessage(error)}`));
        });
      })
      .catch((error: unknown) => log.error(`Failed to write callback response: ${errorMessage(error)}`));
  });

  const close = (): Promise<void> => {
    if (!closing) {
      closing = new Promise<void>((resolve, reject) => {
        server.close((error) => {
          if (error && (error as NodeJS.ErrnoException).code !== "ERR_SERVER_NOT_RUNNING") {
            reject(error);
            return;
          }
          resolve();
        });
        server.closeAllConnections();
      });
    }

    return closing;
  };

  try {
    await listen(server, preferredPort);
  } catch (error) {
    log.warn(`Port ${preferredPort} unavailable (${errorMessage(error)}); using an ephemeral port.`);
    await listen(server, 0);
  }

  const address = server.address();
  if (!address || typeof address === "string") {
    await close();
    throw new Error("Callback server did not bind a TCP port");
  }

  const port = address.port;
  log.debug(`Listening on ${CALLBACK_HOST}:${port}`);

  return {
    port,
    redirectUri: `http://${CALLBACK_HOST}:${port}${CALLBACK_PATH}`,
    get closed() {
      return closing !== null;
    },
    close
  };
}
