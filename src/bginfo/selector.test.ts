/**
 * BGInfo Version Selector: Tests
 */

import { describe, it, expect, vi, beforeEach } from "vitest";
import {
  canonicalizeLocation,
  parseVersion,
  pickHighestVersion,
  selectBginfoVersion,
} from "./selector.js";
import type { ExtensionImageClientLike } from "./types.js";

const client = {
  listPublishers: vi.fn<ExtensionImageClientLike["listPublishers"]>(),
  listExtensionTypes: vi.fn<ExtensionImageClientLike["listExtensionTypes"]>(),
  listExtensionVersions: vi.fn<ExtensionImageClientLike["listExtensionVersions"]>(),
};

describe("parseVersion", () => {
  it("accepts two to four numeric components", () => {
    expect(parseVersion("2.1")).toEqual({ major: 2, minor: 1 });
    expect(parseVersion("1.10.3")).toEqual({ major: 1, minor: 10 });
    expect(parseVersion("3.0.0.7")).toEqual({ major: 3, minor: 0 });
  });

  it("rejects anything else", () => {
    expect(parseVersion("bogus")).toBeNull();
    expect(parseVersion("2")).toBeNull();
    expect(parseVersion("1.2.3.4.5")).toBeNull();
    expect(parseVersion("v1.2")).toBeNull();
  });
});

describe("canonicalizeLocation", () => {
  it("drops spaces and lower-cases", () => {
    expect(canonicalizeLocation("West US 2")).toBe("westus2");
    expect(canonicalizeLocation("eastus")).toBe("eastus");
  });
});

describe("pickHighestVersion", () => {
  it("returns the greatest parsable version", () => {
    expect(pickHighestVersion(["1.0", "2.3", "bogus"])).toBe("2.3");
  });

  it("compares numerically, not as text", () => {
    expect(pickHighestVersion(["1.9", "1.10", "1.2.5"])).toBe("1.10");
  });

  it("drops the build component", () => {
    expect(pickHighestVersion(["2.1.0", "2.1.4"])).toBe("2.1");
  });

  it("falls back to the default when nothing parses", () => {
    expect(pickHighestVersion(["latest", "bogus"])).toBe("2.1");
  });

  it("returns undefined for an empty list", () => {
    expect(pickHighestVersion([])).toBeUndefined();
  });
});

describe("selectBginfoVersion", () => {
  beforeEach(() => {
    vi.resetAllMocks();
    client.listPublishers.mockResolvedValue(["Canonical", "Microsoft.Compute"]);
    client.listExtensionTypes.mockResolvedValue(["CustomScriptExtension", "BGInfo"]);
    client.listExtensionVersions.mockResolvedValue(["1.0", "2.3", "bogus"]);
  });

  it("queries with the canonical location and returns the newest version", async () => {
    expect(await selectBginfoVersion(client, "West Europe")).toBe("2.3");
    expect(client.listPublishers).toHaveBeenCalledWith("westeurope");
    expect(client.listExtensionTypes).toHaveBeenCalledWith("westeurope", "Microsoft.Compute");
    expect(client.listExtensionVersions).toHaveBeenCalledWith("westeurope", "Microsoft.Compute", "BGInfo");
  });

  it("returns undefined when the publisher is missing", async () => {
    client.listPublishers.mockResolvedValue(["Canonical"]);
    expect(await selectBginfoVersion(client, "eastus")).toBeUndefined();
    expect(client.listExtensionTypes).not.toHaveBeenCalled();
  });

  it("returns undefined when the extension type is missing", async () => {
    client.listExtensionTypes.mockResolvedValue(["CustomScriptExtension"]);
    expect(await selectBginfoVersion(client, "eastus")).toBeUndefined();
    expect(client.listExtensionVersions).not.toHaveBeenCalled();
  });

  it("returns undefined when no versions are published", async () => {
    client.listExtensionVersions.mockResolvedValue([]);
    expect(await selectBginfoVersion(client, "eastus")).toBeUndefined();
  });

  it("matches publisher and type names exactly", async () => {
    client.listPublishers.mockResolvedValue(["microsoft.compute"]);
    expect(await selectBginfoVersion(client, "eastus")).toBeUndefined();
  });
});
