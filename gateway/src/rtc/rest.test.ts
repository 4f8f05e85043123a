import { createServer, type IncomingHttpHeaders, type RequestListener, type Server } from "http";
import { afterEach, describe, expect, it } from "vitest";
import { ConfigFormatError, CredentialFetchError } from "../errors.js";
import { fetchRestRtcConfig } from "./rest.js";

let server: Server | null = null;

async function serve(handler: RequestListener): Promise<string> {
  const srv = createServer(handler);
  server = srv;
  await new Promise<void>((resolve) => srv.listen(0, "127.0.0.1", resolve));
  const address = srv.address();
  if (!address || typeof address === "string") throw new Error("server has no port");
  return `http://127.0.0.1:${address.port}/turn`;
}

afterEach(async () => {
  const srv = server;
  server = null;
  if (srv) await new Promise<void>((resolve) => srv.close(() => resolve()));
});

const DOC = JSON.stringify({
  iceServers: [
    { urls: ["stun:turn.example.com:3478"] },
    { urls: ["turn:turn.example.com:3478?transport=udp"], username: "u", credential: "p" },
  ],
});

describe("fetchRestRtcConfig", () => {
  it("sends the auth header and decodes the response", async () => {
    let headers: IncomingHttpHeaders = {};
    const uri = await serve((req, res) => {
      headers = req.headers;
      res.writeHead(200, { "Content-Type": "application/json" });
      res.end(DOC);
    });

    const decoded = await fetchRestRtcConfig(uri, "gateway-test", "x-auth-user");

    expect(headers["x-auth-user"]).toBe("gateway-test");
    expect(decoded.stunServers).toEqual(["stun://turn.example.com:3478"]);
    expect(decoded.turnServers).toEqual(["turn://u:p@turn.example.com:3478"]);
    expect(decoded.rtcConfig).toBe(DOC);
  });

  it("keeps status and body of an error response", async () => {
    const uri = await serve((_req, res) => {
      res.writeHead(403, "Forbidden");
      res.end("denied");
    });

    const err = await fetchRestRtcConfig(uri, "gateway-test", "x-auth-user").catch((e: unknown) => e);

    expect(err).toBeInstanceOf(CredentialFetchError);
    if (!(err instanceof CredentialFetchError)) return;
    expect(err.status).toBe(403);
    expect(err.reason).toBe("Forbidden");
    expect(err.body).toBe("denied");
  });

  it("rejects an empty body", async () => {
    const uri = await serve((_req, res) => {
      res.writeHead(200);
      res.end();
    });

    await expect(fetchRestRtcConfig(uri, "gateway-test", "x-auth-user")).rejects.toThrow(
      "data from TURN REST service was empty"
    );
  });

  it("passes decode errors through", async () => {
    const uri = await serve((_req, res) => {
      res.writeHead(200);
      res.end(JSON.stringify({ lifetimeDuration: "1s" }));
    });

    await expect(fetchRestRtcConfig(uri, "gateway-test", "x-auth-user")).rejects.toBeInstanceOf(
      ConfigFormatError
    );
  });

  it("rejects when nothing listens", async () => {
    const uri = await serve((_req, res) => res.end());
    const srv = server;
    server = null;
    if (srv) await new Promise<void>((resolve) => srv.close(() => resolve()));

    const err = await fetchRestRtcConfig(uri, "gateway-test", "x-auth-user").catch((e: unknown) => e);

    expect(err).toBeInstanceOf(CredentialFetchError);
    if (!(err instanceof CredentialFetchError)) return;
    expect(err.status).toBeUndefined();
  });

  it("rejects an invalid uri", async () => {
    await expect(fetchRestRtcConfig("not a uri", "gateway-test", "x-auth-user")).rejects.toThrow(
      'invalid TURN REST uri: "not a uri"'
    );
  });
});
