import { createServer, type IncomingMessage, type Server, type ServerResponse } from "node:http";
import { afterAll, beforeAll, beforeEach, describe, expect, it } from "vitest";
import { HttpTaskGateway } from "../../src/gateway/http-gateway.js";

type Received = { method: string; url: string; body: string };
type Responder = (req: IncomingMessage, res: ServerResponse) => void;

let server: Server;
let baseUrl: string;
let received: Received[] = [];
let respond: Responder;

function reply(status: number, body: string): Responder {
  return (_req, res) => {
    res.writeHead(status, { "Content-Type": "application/json" });
    res.end(body);
  };
}

beforeAll(async () => {
  server = createServer((req, res) => {
    const chunks: Buffer[] = [];
    req.on("data", (chunk: Buffer) => chunks.push(chunk));
    req.on("end", () => {
      received.push({ method: req.method ?? "", url: req.url ?? "", body: Buffer.concat(chunks).toString("utf-8") });
      respond(req, res);
    });
  });
  await new Promise<void>((resolve) => server.listen(0, "127.0.0.1", resolve));
  const addr = server.address();
  if (!addr || typeof addr !== "object") throw new Error("no address");
  baseUrl = `http://127.0.0.1:${addr.port}`;
});

afterAll(async () => {
  server.closeAllConnections();
  await new Promise<void>((resolve) => server.close(() => resolve()));
});

beforeEach(() => {
  received = [];
  respond = reply(200, JSON.stringify({ success: true, result: null }));
});

const request = { taskId: "wf_create_pr", operation: "create_pull_request", arguments: { title: "Fix" } };

describe("HttpTaskGateway", () => {
  it("posts tool and arguments to /call and returns the result", async () => {
    respond = reply(200, JSON.stringify({ success: true, result: { pr_id: 5 } }));
    const gateway = new HttpTaskGateway({ url: baseUrl });

    const result = await gateway.execute(request);

    expect(result).toMatchObject({ status: "ok", result: { pr_id: 5 }, metadata: { httpStatus: 200 } });
    expect(received).toHaveLength(1);
    expect(received[0].method).toBe("POST");
    expect(received[0].url).toBe("/call");
    expect(JSON.parse(received[0].body)).toEqual({ tool: "create_pull_request", arguments: { title: "Fix" } });
  });

  it("returns null when success carries no result", async () => {
    respond = reply(200, JSON.stringify({ success: true }));
    const result = await new HttpTaskGateway({ url: baseUrl }).execute(request);
    expect(result).toMatchObject({ status: "ok", result: null });
  });

  it("reports the executor's own error message", async () => {
    respond = reply(200, JSON.stringify({ success: false, error: "branch already exists" }));
    const result = await new HttpTaskGateway({ url: baseUrl }).execute(request);
    expect(result).toMatchObject({ status: "error", error: "branch already exists" });
  });

  it("uses a generic message when the executor gives none", async () => {
    respond = reply(200, JSON.stringify({ success: false }));
    const result = await new HttpTaskGateway({ url: baseUrl }).execute(request);
    expect(result).toMatchObject({ status: "error", error: "Executor reported failure" });
  });

  it("treats a non-2xx status as an error", async () => {
    respond = reply(503, "maintenance");
    const result = await new HttpTaskGateway({ url: baseUrl }).execute(request);
    expect(result).toMatchObject({ status: "error", error: "HTTP 503: maintenance", metadata: { httpStatus: 503 } });
  });

  it("rejects bodies that are not JSON", async () => {
    respond = reply(200, "<html>");
    const result = await new HttpTaskGateway({ url: baseUrl }).execute(request);
    expect(result).toMatchObject({ status: "error", error: "Executor returned invalid JSON" });
  });

  it("rejects JSON without a success flag", async () => {
    respond = reply(200, JSON.stringify({ ok: true }));
    const result = await new HttpTaskGateway({ url: baseUrl }).execute(request);
    expect(result.status).toBe("error");
    expect(result.status === "error" && result.error).toMatch(/^Executor returned an unexpected body: /);
  });

  it("times out a call that never answers", async () => {
    respond = () => {};
    const result = await new HttpTaskGateway({ url: baseUrl, timeout: 50 }).execute(request);
    expect(result).toMatchObject({ status: "timeout", error: "Timed out after 50ms" });
  });

  it("sends extra headers and honours a custom call path", async () => {
    let auth: string | undefined;
    respond = (req, res) => {
      auth = req.headers.authorization;
      reply(200, JSON.stringify({ success: true, result: 1 }))(req, res);
    };
    const gateway = new HttpTaskGateway({
      url: `${baseUrl}/`,
      callPath: "/v2/call",
      headers: { Authorization: "Bearer test-token" },
    });

    expect(gateway.endpoint).toBe(`${baseUrl}/v2/call`);
    await gateway.execute(request);
    expect(received[0].url).toBe("/v2/call");
    expect(auth).toBe("Bearer test-token");
  });

  it("checks health with a GET on the base url", async () => {
    respond = reply(200, "{}");
    expect(await new HttpTaskGateway({ url: baseUrl }).healthCheck()).toBe(true);
    expect(received[0]).toMatchObject({ method: "GET", url: "/" });

    respond = reply(500, "{}");
    expect(await new HttpTaskGateway({ url: baseUrl }).healthCheck()).toBe(false);
  });
});
