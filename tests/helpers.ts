import { vi } from "vitest";
import { BaseClient } from "../src/base-client";
import { formatGraphUrl } from "../src/paths";
import type { GraphTransport } from "../src/transport";
import type { GraphJson, SharePointConfig } from "../src/types";

export const TEST_CONFIG: SharePointConfig = {
  tenantId: "test-tenant",
  clientId: "test-client",
  clientSecret: "test-secret",
  sharepointUrl: "contoso.sharepoint.com",
  resourceUrl: "https://graph.microsoft.com/",
};

export const TEST_TOKEN = "test-token";

/** Response for a URL: a JSON body, or an Error the transport rejects with */
export type Route = GraphJson | Error;

export function childrenUrl(driveId: string, folderId: string): string {
  return formatGraphUrl("drives", driveId, "items", folderId, "children");
}

export function folder(name: string, id: string, parentPath?: string) {
  return {
    name,
    id,
    folder: { childCount: 0 },
    ...(parentPath ? { parentReference: { path: parentPath } } : {}),
  };
}

export function file(name: string, id: string, size?: number) {
  return {
    name,
    id,
    file: { mimeType: "application/octet-stream" },
    webUrl: `https://contoso.sharepoint.com/${name}`,
    ...(size === undefined ? {} : { size }),
  };
}

export function listing(...items: GraphJson[]): GraphJson {
  return { value: items };
}

/**
 * In-memory transport answering each URL from a route table. Unknown URLs
 * reject like a 404 would.
 */
export function createFakeTransport(routes: Record<string, Route> = {}) {
  const request = vi.fn<GraphTransport["request"]>(async (url) => {
    const route = routes[url];
    if (route === undefined) {
      throw new Error(`404 itemNotFound: ${url}`);
    }
    if (route instanceof Error) {
      throw route;
    }
    return route;
  });

  const download = vi.fn<GraphTransport["download"]>(async (url) => {
    throw new Error(`404 itemNotFound: ${url}`);
  });

  const transport: GraphTransport = { request, download };
  return { transport, request, download };
}

export function createTestClient(
  routes: Record<string, Route> = {},
  token: string | null = TEST_TOKEN
) {
  const fake = createFakeTransport(routes);
  const client = new BaseClient(TEST_CONFIG, token, fake.transport);
  return { client, ...fake };
}

export function requestedUrls(request: { mock: { calls: unknown[][] } }) {
  return request.mock.calls.map((call) => call[0]);
}

export function silenceConsole() {
  return {
    debug: vi.spyOn(console, "debug").mockImplementation(() => undefined),
    info: vi.spyOn(console, "info").mockImplementation(() => undefined),
    warn: vi.spyOn(console, "warn").mockImplementation(() => undefined),
    error: vi.spyOn(console, "error").mockImplementation(() => undefined),
  };
}
