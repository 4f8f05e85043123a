/**
 * Fetch an ICE server descriptor from a TURN REST web service
 * (coturn-web style). The service identifies the caller by a header,
 * e.g. "x-auth-user: <hostname>", and answers with the descriptor.
 */

import { request as httpRequest } from "http";
import { request as httpsRequest } from "https";
import { CredentialFetchError } from "../errors.js";
import { decodeRtcConfig, type DecodedRtcConfig } from "./descriptor.js";

const REQUEST_TIMEOUT_MS = 10_000;

export function fetchRestRtcConfig(
  uri: string,
  username: string,
  authHeaderName: string
): Promise<DecodedRtcConfig> {
  let target: URL;
  try {
    target = new URL(uri);
  } catch {
    return Promise.reject(new CredentialFetchError(`invalid TURN REST uri: "${uri}"`));
  }

  const makeReq = target.protocol === "https:" ? httpsRequest : httpRequest;

  return new Promise((resolve, reject) => {
    const req = makeReq(
      target,
      {
        method: "GET",
        headers: { [authHeaderName]: username },
        timeout: REQUEST_TIMEOUT_MS,
      },
      (res) => {
        const chunks: Buffer[] = [];
        res.on("data", (chunk: Buffer) => chunks.push(chunk));
        res.on("error", (err) => {
          reject(new CredentialFetchError(`TURN REST response failed: ${err.message}`));
        });
        res.on("end", () => {
          const body = Buffer.concat(chunks).toString("utf-8");
          const status = res.statusCode ?? 0;

          if (status >= 400) {
            reject(
              new CredentialFetchError(
                `error fetching TURN REST config. Status code: ${status}. ${res.statusMessage ?? ""}, ${body}`,
                { status, reason: res.statusMessage, body }
              )
            );
            return;
          }
          if (!body) {
            reject(
              new CredentialFetchError("data from TURN REST service was empty", {
                status,
                reason: res.statusMessage,
                body,
              })
            );
            return;
          }

          try {
            resolve(decodeRtcConfig(body));
          } catch (err) {
            reject(err);
          }
        });
      }
    );

    req.on("timeout", () => {
      req.destroy(new Error(`timed out after ${REQUEST_TIMEOUT_MS}ms`));
    });

    req.on("error", (err) => {
      reject(new CredentialFetchError(`TURN REST request failed: ${err.message}`));
    });

    req.end();
  });
}
