import { createServer, type IncomingMessage, type Server } from "node:http";
import { afterAll, beforeAll, describe, expect, it } from "vitest";
import type { CapabilityRequest } from "../../src/capabilities/capability.js";
import { HttpCapability } from "../../src/capabilities/http-capability.js";
import { CallError } from "../../src/errors.js";

const request: CapabilityRequest = {
  runId: "r1",
  taskId: "t",
  kind: "sentiment",
  input: { ticker: "AAPL" },
  metadata: {},
  attempt: 2,
};

function readBody(req: IncomingMessage): Promise<string> {
  return new Promise((resolve, reject) => {
    let body = "";
    req.on("data", (chunk: Buffer) => (body += chunk.toString()));
    req.on("end", () => resolve(body));
    req.on("error", reject);
  });
}

let server: Server;
let baseUrl = "";
const received: Array<{ body: string; auth?: string }> = [];

beforeAll(async () => {
  server = createServer((req, res) => {
    void readBody(req).then((body) => {
      received.push({ body, auth: req.headers.authorization });
      if (req.url === "/ok") {
        res.writeHead(200, { "Content-Type": "application/json" });
        res.end('{"sentiments":[]}');
      } else if (req.url === "/fail") {
        res.writeHead(500);
        res.end("boom");
      }
      // "/slow" never answers
    });
  });
  await new Promise<void>((resolve) => server.listen(0, "127.0.0.1", resolve));
  const address = server.address();
  if (address === null || typeof address === "string") throw new Error("server has no port");
  baseUrl = `http://127.0.0.1:${address.port}`;
});

afterAll(async () => {
  server.closeAllConnections();
  await new Promise<void>((resolve) => server.close(() => resolve()));
});

async function callError(promise: Promise<unknown>): Promise<CallError> {
  try {
    await promise;
  } catch (err) {
    if (err instanceof CallError) return err;
    throw err;
  }
  throw new Error("expected CallError");
}

describe("HttpCapability", () => {
  it("has correct type and name", () => {
    const capability = new HttpCapability({ name: "api", url: "http://127.0.0.1:1", kinds: ["sentiment"] });
    expect(capability.name).toBe("api");
    expect(capability.type).toBe("http");
  });

  it("posts the request as JSON and returns the raw body", async () => {
    const capability = new HttpCapability({
      name: "api",
      url: `${baseUrl}/ok`,
      kinds: ["sentiment"],
      headers: { Authorization: "Bearer test-secret" },
    });
    const body = await capability.invoke(request, { signal: new AbortController().signal, timeoutMs: 1000 });

    expect(body).toBe('{"sentiments":[]}');
    const last = received[received.length - 1];
    expect(last?.auth).toBe("Bearer test-secret");
    expect(JSON.parse(last?.body ?? "null")).toEqual(request);
  });

  it("maps non-2xx responses to transport errors", async () => {
    const capability = new HttpCapability({ name: "api", url: `${baseUrl}/fail`, kinds: ["sentiment"] });
    const err = await callError(capability.invoke(request, { signal: new AbortController().signal, timeoutMs: 1000 }));
    expect(err.reason).toBe("transport");
    expect(err.message).toBe("HTTP 500: boom");
  });

  it("maps unreachable endpoints to transport errors", async () => {
    const capability = new HttpCapability({ name: "down", url: "http://127.0.0.1:1", kinds: ["sentiment"] });
    const err = await callError(capability.invoke(request, { signal: new AbortController().signal, timeoutMs: 1000 }));
    expect(err.reason).toBe("transport");
  });

  it("reports aborted requests as aborted", async () => {
    const capability = new HttpCapability({ name: "api", url: `${baseUrl}/slow`, kinds: ["sentiment"] });
    const controller = new AbortController();
    setTimeout(() => controller.abort(), 20);
    const err = await callError(capability.invoke(request, { signal: controller.signal, timeoutMs: 1000 }));
    expect(err.reason).toBe("aborted");
  });
});
