import { createServer, type IncomingMessage, type Server, type ServerResponse } from "http";
import { handleRequest, type HandlerContext } from "./handler";

class PayloadTooLargeError extends Error {}

async function readBody(req: IncomingMessage, limit: number): Promise<Buffer> {
  const chunks: Buffer[] = [];
  let size = 0;
  for await (const chunk of req) {
    const buffer = Buffer.isBuffer(chunk) ? chunk : Buffer.from(chunk);
    size += buffer.length;
    if (size > limit) {
      throw new PayloadTooLargeError(`Upload exceeds ${limit} bytes`);
    }
    chunks.push(buffer);
  }
  return Buffer.concat(chunks);
}

export function toFetchRequest(req: IncomingMessage, body: Buffer | null): Request {
  const url = new URL(req.url ?? "/", `http://${req.headers.host ?? "localhost"}`);
  const headers = new Headers();
  for (const [key, value] of Object.entries(req.headers)) {
    if (value === undefined) continue;
    headers.set(key, Array.isArray(value) ? value.join(", ") : value);
  }
  return new Request(url, {
    method: req.method ?? "GET",
    headers,
    body
  });
}

async function writeResponse(res: ServerResponse, response: Response): Promise<void> {
  res.statusCode = response.status;
  response.headers.forEach((value, key) => {
    res.setHeader(key, value);
  });
  res.end(Buffer.from(await response.arrayBuffer()));
}

async function serveNodeRequest(
  req: IncomingMessage,
  res: ServerResponse,
  context: HandlerContext
): Promise<void> {
  const method = req.method ?? "GET";
  let body: Buffer | null = null;
  if (method !== "GET" && method !== "HEAD") {
    try {
      body = await readBody(req, context.settings.max_upload_bytes);
    } catch (error) {
      if (error instanceof PayloadTooLargeError) {
        await writeResponse(res, Response.json({ error: error.message }, { status: 413 }));
        return;
      }
      throw error;
    }
  }
  const response = await handleRequest(toFetchRequest(req, body), context);
  await writeResponse(res, response);
}

export function createScheduleServer(context: HandlerContext): Server {
  const server = createServer((req, res) => {
    serveNodeRequest(req, res, context).catch((error: unknown) => {
      console.error("Unhandled server error", error);
      if (!res.headersSent) {
        res.statusCode = 500;
      }
      res.end();
    });
  });
  server.requestTimeout = context.settings.request_timeout_ms;
  return server;
}

export function startServer(context: HandlerContext): Promise<Server> {
  const server = createScheduleServer(context);
  return new Promise((resolve, reject) => {
    server.once("error", reject);
    server.listen(context.settings.port, context.settings.host, () => {
      server.off("error", reject);
      resolve(server);
    });
  });
}
