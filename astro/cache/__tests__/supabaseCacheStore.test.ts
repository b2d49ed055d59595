import { beforeEach, describe, expect, it, vi } from "vitest";

const mocks = vi.hoisted(() => {
  const maybeSingle = vi.fn();
  const selectEq = vi.fn(() => ({ maybeSingle }));
  const select = vi.fn(() => ({ eq: selectEq }));
  const upsert = vi.fn();
  const deleteEq = vi.fn();
  const del = vi.fn(() => ({ eq: deleteEq }));
  const from = vi.fn(() => ({ select, upsert, delete: del }));
  return { maybeSingle, selectEq, select, upsert, deleteEq, del, from };
});

vi.mock("../../../lib/supabaseClient.js", () => ({
  getSupabaseClient: () => ({ from: mocks.from }),
}));

import { CACHE_TABLE, SupabaseCacheStore } from "../supabaseCacheStore.js";

describe("SupabaseCacheStore", () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it("reads a row by key", async () => {
    mocks.maybeSingle.mockResolvedValue({
      data: { key: "k", kind: "panchang", value: { a: 1 }, expires_at: "2024-01-07T00:30:00+00:00" },
      error: null,
    });

    const row = await new SupabaseCacheStore().read("k");

    expect(mocks.from).toHaveBeenCalledWith(CACHE_TABLE);
    expect(mocks.select).toHaveBeenCalledWith("key, kind, value, expires_at");
    expect(mocks.selectEq).toHaveBeenCalledWith("key", "k");
    expect(row).toEqual({ key: "k", kind: "panchang", value: { a: 1 }, expires_at: "2024-01-07T00:30:00+00:00" });
  });

  it("returns null when no row exists", async () => {
    mocks.maybeSingle.mockResolvedValue({ data: null, error: null });
    expect(await new SupabaseCacheStore().read("missing")).toBeNull();
  });

  it("rethrows query errors", async () => {
    const error = { message: "permission denied", code: "42501" };
    mocks.maybeSingle.mockResolvedValue({ data: null, error });
    await expect(new SupabaseCacheStore().read("k")).rejects.toBe(error);
  });

  it("rejects rows of an unknown kind", async () => {
    mocks.maybeSingle.mockResolvedValue({
      data: { key: "k", kind: "horoscope", value: {}, expires_at: null },
      error: null,
    });
    await expect(new SupabaseCacheStore().read("k")).rejects.toThrow();
  });

  it("upserts on the key", async () => {
    mocks.upsert.mockResolvedValue({ error: null });

    await new SupabaseCacheStore().write({ key: "k", kind: "muhurta", value: [1], expires_at: null });

    expect(mocks.upsert).toHaveBeenCalledWith(
      expect.objectContaining({ key: "k", kind: "muhurta", value: [1], expires_at: null }),
      { onConflict: "key" }
    );
  });

  it("surfaces write and delete errors", async () => {
    const error = { message: "timeout" };
    mocks.upsert.mockResolvedValue({ error });
    mocks.deleteEq.mockResolvedValue({ error });
    const store = new SupabaseCacheStore();

    await expect(store.write({ key: "k", kind: "muhurta", value: 1, expires_at: null })).rejects.toBe(error);
    await expect(store.remove("k")).rejects.toBe(error);
    expect(mocks.deleteEq).toHaveBeenCalledWith("key", "k");
  });
});
