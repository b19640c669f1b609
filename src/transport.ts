/**
 * HTTP transport for Graph requests
 *
 * Clients only see the GraphTransport interface; the default implementation
 * sends requests through the Microsoft Graph SDK with the bearer token
 * supplied by its owner.
 */
import type { ReadableStream } from "node:stream/web";
import { Client, ResponseType } from "@microsoft/microsoft-graph-client";
import { MalformedResponseError, MissingTokenError } from "./errors";
import type { GraphJson, GraphRequestBody, HttpMethod } from "./types";

export interface GraphTransport {
  /**
   * Send one request and return the parsed JSON body, or an empty object when
   * the response has no JSON body. Throws on HTTP and network errors.
   */
  request(
    url: string,
    method: HttpMethod,
    body?: GraphRequestBody,
    headers?: Record<string, string>
  ): Promise<GraphJson>;

  /** GET raw content (e.g. items/{id}/content) */
  download(url: string): Promise<Buffer>;
}

export type TokenProvider = () => string | null;

export class SdkGraphTransport implements GraphTransport {
  private readonly client: Client;

  constructor(getToken: TokenProvider) {
    this.client = Client.init({
      authProvider: (done) => {
        const token = getToken();
        if (token) {
          done(null, token);
        } else {
          done(new MissingTokenError(), null);
        }
      },
    });
  }

  async request(
    url: string,
    method: HttpMethod,
    body?: GraphRequestBody,
    headers: Record<string, string> = {}
  ): Promise<GraphJson> {
    const request = this.client
      .api(url)
      .headers({ Accept: "application/json", ...headers });

    let response: unknown;
    switch (method) {
      case "GET":
        response = await request.get();
        break;
      case "POST":
        response = await request.post(body);
        break;
      case "PUT":
        response = await request.put(body);
        break;
      case "PATCH":
        response = await request.patch(body);
        break;
      case "DELETE":
        response = await request.delete();
        break;
    }

    return isJsonObject(response) ? response : {};
  }

  async download(url: string): Promise<Buffer> {
    const response: unknown = await this.client
      .api(url)
      .responseType(ResponseType.ARRAYBUFFER)
      .get();
    return responseToBuffer(response, url);
  }
}

export function isJsonObject(value: unknown): value is GraphJson {
  if (value === null || typeof value !== "object") {
    return false;
  }
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

/**
 * Convert a content response (Buffer, ArrayBuffer, ReadableStream or text)
 * to a Buffer
 */
export async function responseToBuffer(
  response: unknown,
  url: string
): Promise<Buffer> {
  if (Buffer.isBuffer(response)) {
    return response;
  }

  if (response instanceof ArrayBuffer) {
    return Buffer.from(response);
  }

  if (isReadableStream(response)) {
    return readStreamToBuffer(response);
  }

  if (typeof response === "string") {
    return Buffer.from(response);
  }

  throw new MalformedResponseError(url, ["expected binary file content"]);
}

function isReadableStream(value: unknown): value is ReadableStream<Uint8Array> {
  return value !== null && typeof value === "object" && "getReader" in value;
}

async function readStreamToBuffer(
  stream: ReadableStream<Uint8Array>
): Promise<Buffer> {
  const reader = stream.getReader();
  const chunks: Uint8Array[] = [];

  let result = await reader.read();
  while (result.done === false) {
    if (result.value) {
      chunks.push(result.value);
    }
    result = await reader.read();
  }

  return Buffer.concat(chunks);
}
