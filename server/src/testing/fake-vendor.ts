import express from "express";

import { listenOnEphemeralPort } from "./listen";

export type RecordedRequest = {
  method: string;
  path: string;
  query: Record<string, string>;
  headers: Record<string, string | string[] | undefined>;
  rawBody: string;
};

export type CannedResponse = {
  status: number;
  body: string;
  headers?: Record<string, string>;
  truncated?: boolean; // announce more bytes than are sent, then drop the connection
};

export type FakeVendor = {
  baseUrl: string;
  requests: RecordedRequest[];
  respond(res: CannedResponse): void;
  close(): Promise<void>;
};

/** Stand-in for the vendor API, bound to an ephemeral localhost port. */
export async function startFakeVendor(): Promise<FakeVendor> {
  const requests: RecordedRequest[] = [];
  let next: CannedResponse = { status: 200, body: "{}" };

  const app = express();
  app.use(express.text({ type: "*/*" }));

  app.all("*", (req, res) => {
    const query: Record<string, string> = {};
    for (const [k, v] of Object.entries(req.query)) {
      if (typeof v === "string") query[k] = v;
    }

    requests.push({
      method: req.method,
      path: req.path,
      query,
      headers: req.headers,
      rawBody: typeof req.body === "string" ? req.body : "",
    });

    res.status(next.status);
    for (const [k, v] of Object.entries(next.headers ?? {})) res.setHeader(k, v);
    res.type("application/json");

    if (next.truncated) {
      res.setHeader("Content-Length", String(Buffer.byteLength(next.body) + 100));
      res.write(next.body);
      setTimeout(() => req.socket.destroy(), 20);
      return;
    }

    res.send(next.body);
  });

  const listening = await listenOnEphemeralPort(app);

  return {
    baseUrl: `${listening.url}/v1`,
    requests,
    respond(res) {
      next = res;
    },
    close: () => listening.close(),
  };
}
