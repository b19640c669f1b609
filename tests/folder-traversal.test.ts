import { tmpdir } from "node:os";
import { join } from "node:path";
import { beforeEach, describe, expect, it } from "vitest";
import { setupLogging } from "../src/logger";
import { ReadClient } from "../src/read-client";
import {
  childrenUrl,
  createTestClient,
  file,
  folder,
  listing,
  requestedUrls,
  type Route,
  silenceConsole,
} from "./helpers";

const DRIVE = "drive-1";

function readClient(routes: Record<string, Route>, token?: string | null) {
  const fake = createTestClient(routes, token);
  return { reader: new ReadClient(fake.client), request: fake.request };
}

describe("getNestedFolderInfo", () => {
  beforeEach(() => {
    silenceConsole();
  });

  it("resolves each segment down to the deepest folder", async () => {
    const { reader, request } = readClient({
      [childrenUrl(DRIVE, "root")]: listing(folder("Folder1", "F1")),
      [childrenUrl(DRIVE, "F1")]: listing(folder("Folder2", "F2")),
    });

    const result = await reader.getNestedFolderInfo(DRIVE, "Folder1/Folder2");

    expect(result).toEqual({ id: "F2", name: "Folder2" });
    expect(requestedUrls(request)).toEqual([
      childrenUrl(DRIVE, "root"),
      childrenUrl(DRIVE, "F1"),
    ]);
  });

  it("returns null when the first segment has no match", async () => {
    const { reader, request } = readClient({
      [childrenUrl(DRIVE, "root")]: listing(folder("Other", "X")),
    });

    const result = await reader.getNestedFolderInfo(DRIVE, "Folder1/Folder2");

    expect(result).toBeNull();
    expect(request).toHaveBeenCalledTimes(1);
  });

  it("never returns a partial match for a deeper missing segment", async () => {
    const { reader } = readClient({
      [childrenUrl(DRIVE, "root")]: listing(folder("Folder1", "F1")),
      [childrenUrl(DRIVE, "F1")]: listing(folder("Elsewhere", "E1")),
    });

    expect(await reader.getNestedFolderInfo(DRIVE, "Folder1/Folder2")).toBeNull();
  });

  it("only descends into folders, not files of the same name", async () => {
    const { reader } = readClient({
      [childrenUrl(DRIVE, "root")]: listing(file("Folder1", "file-1")),
    });

    expect(await reader.getNestedFolderInfo(DRIVE, "Folder1")).toBeNull();
  });

  it("compares names case-sensitively", async () => {
    const { reader } = readClient({
      [childrenUrl(DRIVE, "root")]: listing(folder("Folder1", "F1")),
    });

    expect(await reader.getNestedFolderInfo(DRIVE, "folder1")).toBeNull();
  });

  it("takes the first of duplicate names in listing order", async () => {
    const { reader } = readClient({
      [childrenUrl(DRIVE, "root")]: listing(
        folder("Folder1", "F1-first"),
        folder("Folder1", "F1-second")
      ),
    });

    expect(await reader.getNestedFolderInfo(DRIVE, "Folder1")).toEqual({
      id: "F1-first",
      name: "Folder1",
    });
  });

  it("fails when a listing along the way fails", async () => {
    const { reader } = readClient({
      [childrenUrl(DRIVE, "root")]: listing(folder("Folder1", "F1")),
      [childrenUrl(DRIVE, "F1")]: new Error("503 serviceNotAvailable"),
    });

    expect(await reader.getNestedFolderInfo(DRIVE, "Folder1/Folder2")).toBeNull();
  });

  it("treats a listing without value as having no children", async () => {
    const { reader } = readClient({
      [childrenUrl(DRIVE, "root")]: {},
    });

    expect(await reader.getNestedFolderInfo(DRIVE, "Folder1")).toBeNull();
  });

  it("ignores leading and trailing separators", async () => {
    const { reader } = readClient({
      [childrenUrl(DRIVE, "root")]: listing(folder("Folder1", "F1")),
      [childrenUrl(DRIVE, "F1")]: listing(folder("Folder2", "F2")),
    });

    expect(await reader.getNestedFolderInfo(DRIVE, "/Folder1/Folder2/")).toEqual({
      id: "F2",
      name: "Folder2",
    });
  });

  it.each(["", "/", "///"])(
    "returns null without a request for the empty path %j",
    async (path) => {
      const { reader, request } = readClient({});

      expect(await reader.getNestedFolderInfo(DRIVE, path)).toBeNull();
      expect(request).not.toHaveBeenCalled();
    }
  );

  it("gives the same result when called twice", async () => {
    const { reader } = readClient({
      [childrenUrl(DRIVE, "root")]: listing(folder("Folder1", "F1")),
      [childrenUrl(DRIVE, "F1")]: listing(folder("Folder2", "F2")),
    });

    const first = await reader.getNestedFolderInfo(DRIVE, "Folder1/Folder2");
    const second = await reader.getNestedFolderInfo(DRIVE, "Folder1/Folder2");

    expect(second).toEqual(first);
    expect(first).toEqual({ id: "F2", name: "Folder2" });
  });

  it("returns null without a request when there is no token", async () => {
    const { reader, request } = readClient(
      { [childrenUrl(DRIVE, "root")]: listing(folder("Folder1", "F1")) },
      null
    );

    expect(await reader.getNestedFolderInfo(DRIVE, "Folder1")).toBeNull();
    expect(request).not.toHaveBeenCalled();
  });
});

describe("listAllFolders", () => {
  let consoleSpies: ReturnType<typeof silenceConsole>;

  beforeEach(() => {
    consoleSpies = silenceConsole();
  });

  it("stops at an empty leaf", async () => {
    const { reader, request } = readClient({
      [childrenUrl(DRIVE, "root")]: listing(folder("A", "a1")),
      [childrenUrl(DRIVE, "a1")]: listing(),
    });

    expect(await reader.listAllFolders(DRIVE)).toEqual([
      { name: "A", id: "a1", path: "root/A" },
    ]);
    expect(request).toHaveBeenCalledTimes(2);
  });

  it("lists folders in pre-order, siblings in listing order", async () => {
    const { reader } = readClient({
      [childrenUrl(DRIVE, "root")]: listing(
        folder("A", "a"),
        file("notes.txt", "f1", 12),
        folder("B", "b")
      ),
      [childrenUrl(DRIVE, "a")]: listing(folder("A1", "a1"), folder("A2", "a2")),
      [childrenUrl(DRIVE, "a1")]: listing(),
      [childrenUrl(DRIVE, "a2")]: listing(file("deep.txt", "f2")),
      [childrenUrl(DRIVE, "b")]: listing(),
    });

    expect(await reader.listAllFolders(DRIVE)).toEqual([
      { name: "A", id: "a", path: "root/A" },
      { name: "A1", id: "a1", path: "root/A/A1" },
      { name: "A2", id: "a2", path: "root/A/A2" },
      { name: "B", id: "b", path: "root/B" },
    ]);
  });

  it("builds paths from the parent path Graph reports", async () => {
    const { reader } = readClient({
      [childrenUrl(DRIVE, "root")]: listing(
        folder("Docs", "d", "/drives/drive-1/root:")
      ),
      [childrenUrl(DRIVE, "d")]: listing(
        folder("2026", "y", "/drives/drive-1/root:/Docs")
      ),
      [childrenUrl(DRIVE, "y")]: listing(),
    });

    expect(await reader.listAllFolders(DRIVE)).toEqual([
      { name: "Docs", id: "d", path: "/drives/drive-1/root:/Docs" },
      { name: "2026", id: "y", path: "/drives/drive-1/root:/Docs/2026" },
    ]);
  });

  it("drops only the branch whose listing fails", async () => {
    const { reader } = readClient({
      [childrenUrl(DRIVE, "root")]: listing(folder("A", "a"), folder("B", "b")),
      [childrenUrl(DRIVE, "a")]: new Error("403 accessDenied"),
      [childrenUrl(DRIVE, "b")]: listing(folder("C", "c")),
      [childrenUrl(DRIVE, "c")]: listing(),
    });

    expect(await reader.listAllFolders(DRIVE)).toEqual([
      { name: "A", id: "a", path: "root/A" },
      { name: "B", id: "b", path: "root/B" },
      { name: "C", id: "c", path: "root/B/C" },
    ]);
  });

  it("starts from any folder id", async () => {
    const { reader } = readClient({
      [childrenUrl(DRIVE, "a")]: listing(folder("A1", "a1")),
      [childrenUrl(DRIVE, "a1")]: listing(),
    });

    expect(await reader.listAllFolders(DRIVE, "a")).toEqual([
      { name: "A1", id: "a1", path: "a/A1" },
    ]);
  });

  it("returns an empty list when the root listing fails", async () => {
    const { reader } = readClient({});

    expect(await reader.listAllFolders(DRIVE)).toEqual([]);
  });

  it("returns an empty list without a token", async () => {
    const { reader, request } = readClient({}, null);

    expect(await reader.listAllFolders(DRIVE)).toEqual([]);
    expect(request).not.toHaveBeenCalled();
  });

  it("gives the same result when called twice", async () => {
    const { reader } = readClient({
      [childrenUrl(DRIVE, "root")]: listing(folder("A", "a")),
      [childrenUrl(DRIVE, "a")]: listing(folder("B", "b")),
      [childrenUrl(DRIVE, "b")]: listing(),
    });

    const first = await reader.listAllFolders(DRIVE);
    const second = await reader.listAllFolders(DRIVE);

    expect(second).toEqual(first);
    expect(first).toHaveLength(2);
  });

  it("logs each folder indented by depth", async () => {
    const { reader } = readClient({
      [childrenUrl(DRIVE, "root")]: listing(folder("A", "a")),
      [childrenUrl(DRIVE, "a")]: listing(folder("B", "b")),
      [childrenUrl(DRIVE, "b")]: listing(),
    });

    await reader.listAllFolders(DRIVE);

    expect(consoleSpies.info).toHaveBeenCalledWith(
      "[ReadClient] - Folder: A (ID: a)"
    );
    expect(consoleSpies.info).toHaveBeenCalledWith(
      "[ReadClient]   - Folder: B (ID: b)"
    );
  });
});

describe("getFolderContent", () => {
  let consoleSpies: ReturnType<typeof silenceConsole>;

  beforeEach(() => {
    consoleSpies = silenceConsole();
  });

  it("returns null when the listing call fails", async () => {
    const { reader } = readClient({
      [childrenUrl(DRIVE, "F1")]: new Error("500 generalException"),
    });

    expect(await reader.getFolderContent(DRIVE, "F1")).toBeNull();
  });

  it("returns an empty list for an empty folder", async () => {
    const { reader } = readClient({
      [childrenUrl(DRIVE, "F1")]: { value: [] },
    });

    expect(await reader.getFolderContent(DRIVE, "F1")).toEqual([]);
  });

  it("returns an empty list for a response without value", async () => {
    const { reader } = readClient({ [childrenUrl(DRIVE, "F1")]: {} });

    expect(await reader.getFolderContent(DRIVE, "F1")).toEqual([]);
  });

  it("classifies children as folders or files", async () => {
    const { reader } = readClient({
      [childrenUrl(DRIVE, "F1")]: listing(
        folder("Sub", "s1"),
        file("report.pdf", "r1", 2048)
      ),
    });

    expect(await reader.getFolderContent(DRIVE, "F1")).toEqual([
      { id: "s1", name: "Sub", type: "folder", webUrl: undefined, size: "N/A" },
      {
        id: "r1",
        name: "report.pdf",
        type: "file",
        webUrl: "https://contoso.sharepoint.com/report.pdf",
        size: 2048,
      },
    ]);
  });

  it("treats items without a folder marker as files", async () => {
    const { reader } = readClient({
      [childrenUrl(DRIVE, "F1")]: listing({ id: "n1", name: "note" }),
    });

    expect(await reader.getFolderContent(DRIVE, "F1")).toEqual([
      { id: "n1", name: "note", type: "file", webUrl: undefined, size: "N/A" },
    ]);
  });

  it("still answers when the log file cannot be written", async () => {
    setupLogging({ logFile: join(tmpdir(), "graph-client-missing-log-dir", "client.log") });
    try {
      const { reader } = readClient({ [childrenUrl(DRIVE, "F1")]: listing() });

      expect(await reader.getFolderContent(DRIVE, "F1")).toEqual([]);
      expect(consoleSpies.info).toHaveBeenCalledWith(
        "[ReadClient] Found 0 items in folder"
      );
    } finally {
      setupLogging();
    }
  });

  it("returns null for items without an id", async () => {
    const { reader } = readClient({
      [childrenUrl(DRIVE, "F1")]: listing({ name: "orphan" }),
    });

    expect(await reader.getFolderContent(DRIVE, "F1")).toBeNull();
    expect(consoleSpies.error).toHaveBeenCalledWith(
      `[ReadClient] Malformed response from ${childrenUrl(DRIVE, "F1")}: value.0.id: Required`
    );
  });

  it("returns null without a token", async () => {
    const { reader, request } = readClient({}, null);

    expect(await reader.getFolderContent(DRIVE, "F1")).toBeNull();
    expect(request).not.toHaveBeenCalled();
  });

  it("gives the same result when called twice", async () => {
    const { reader } = readClient({
      [childrenUrl(DRIVE, "F1")]: listing(file("a.txt", "1", 3)),
    });

    expect(await reader.getFolderContent(DRIVE, "F1")).toEqual(
      await reader.getFolderContent(DRIVE, "F1")
    );
  });
});
