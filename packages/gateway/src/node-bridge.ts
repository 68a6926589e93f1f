// Bridges node:http to fetch-style handlers: (Request) => Promise<Response>

import type { IncomingMessage, ServerResponse } from "node:http";

export type FetchHandler = (req: Request) => Promise<Response>;

// Connection-level headers describe the node socket, not the buffered body.
const SKIPPED_HEADERS = new Set(["connection", "content-length", "keep-alive", "transfer-encoding", "upgrade"]);

/** Build a Request whose signal fires when the client goes away before the reply is sent. */
export async function toFetchRequest(req: IncomingMessage, signal: AbortSignal): Promise<Request> {
  const url = new URL(req.url ?? "/", `http://${req.headers.host ?? "localhost"}`);
  const method = req.method ?? "GET";

  const headers = new Headers();
  for (const [key, value] of Object.entries(req.headers)) {
    if (value === undefined || SKIPPED_HEADERS.has(key)) continue;
    for (const v of Array.isArray(value) ? value : [value]) headers.append(key, v);
  }

  let body: string | undefined;
  if (method !== "GET" && method !== "HEAD") {
    const chunks: Buffer[] = [];
    for await (const chunk of req) {
      chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
    }
    body = Buffer.concat(chunks).toString("utf8");
  }

  return new Request(url, { method, headers, body, signal });
}

export async function sendResponse(res: ServerResponse, response: Response): Promise<void> {
  const headers: Record<string, string> = {};
  response.headers.forEach((value, key) => {
    headers[key] = value;
  });
  const body = response.body ? Buffer.from(await response.arrayBuffer()) : undefined;
  res.writeHead(response.status, headers);
  res.end(body);
}

/** Adapt a FetchHandler to a node:http request listener. */
export function nodeListener(
  handler: FetchHandler,
  onError: (error: unknown) => void,
): (req: IncomingMessage, res: ServerResponse) => void {
  return (req, res) => {
    const controller = new AbortController();
    res.on("close", () => {
      if (!res.writableFinished) controller.abort();
    });

    toFetchRequest(req, controller.signal)
      .then(handler)
      .then((response) => sendResponse(res, response))
      .catch((error: unknown) => {
        onError(error);
        if (res.writableEnded) return;
        if (!res.headersSent) {
          res.writeHead(500, { "content-type": "application/json" });
        }
        res.end(JSON.stringify({ error: "InternalError", detail: "Internal server error" }));
      });
  };
}
