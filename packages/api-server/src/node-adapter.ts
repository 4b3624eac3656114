import type { IncomingMessage, ServerResponse } from "node:http";

import { describeCause } from "@shellpass/contracts";
import type { ShellpassLogger } from "@shellpass/telemetry";

import type { ShellpassRequestHandler } from "./request-handler.js";

export interface NodeResponseLike {
  statusCode: number;
  readonly headersSent: boolean;
  setHeader(name: string, value: string | ReadonlyArray<string>): unknown;
  end(chunk: string | Uint8Array): unknown;
}

const BODYLESS_METHODS = new Set(["GET", "HEAD"]);

const readBody = async (message: IncomingMessage): Promise<string> => {
  const chunks: Buffer[] = [];
  for await (const chunk of message) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  }
  return Buffer.concat(chunks).toString("utf8");
};

/** Converts a Node request into a fetch `Request`, reading the body for methods that carry one. */
export const toFetchRequest = async (message: IncomingMessage): Promise<Request> => {
  const method = (message.method ?? "GET").toUpperCase();
  const host = message.headers.host ?? "localhost";
  const url = new URL(message.url ?? "/", `http://${host}`);

  const headers = new Headers();
  for (const [name, value] of Object.entries(message.headers)) {
    if (Array.isArray(value)) {
      for (const entry of value) {
        headers.append(name, entry);
      }
    } else if (value !== undefined) {
      headers.set(name, value);
    }
  }

  if (BODYLESS_METHODS.has(method)) {
    return new Request(url, { method, headers });
  }
  return new Request(url, { method, headers, body: await readBody(message) });
};

export const writeFetchResponse = async (response: Response, target: NodeResponseLike): Promise<void> => {
  target.statusCode = response.status;
  response.headers.forEach((value, name) => {
    target.setHeader(name, value);
  });
  target.end(new Uint8Array(await response.arrayBuffer()));
};

export interface NodeListenerOptions {
  readonly logger: ShellpassLogger;
}

/** Request listener for `http.createServer` that serves a fetch-style handler. */
export const createNodeListener = (
  handler: ShellpassRequestHandler,
  options: NodeListenerOptions,
): ((message: IncomingMessage, response: ServerResponse) => void) => {
  const serve = async (message: IncomingMessage, response: ServerResponse): Promise<void> => {
    try {
      const request = await toFetchRequest(message);
      const result = await handler(request, { remoteAddress: message.socket.remoteAddress });
      await writeFetchResponse(result, response);
    } catch (error) {
      options.logger.error("api.node_adapter_failed", { url: message.url, error: describeCause(error) });
      if (!response.headersSent) {
        response.statusCode = 500;
        response.setHeader("content-type", "application/json");
        response.end(JSON.stringify({ error: { code: "internal_error", message: "Internal server error." } }));
      } else {
        response.destroy();
      }
    }
  };

  return (message, response) => {
    void serve(message, response);
  };
};
