/**
 * Tests for the room-status endpoint wrapper.
 */

import { describe, it, expect, vi, beforeEach } from "vitest";

const { mockGet } = vi.hoisted(() => ({
  mockGet: vi.fn<(url: string, config?: unknown) => Promise<{ data: unknown }>>(),
}));

vi.mock("@/utils/http", () => ({
  default: { get: mockGet },
}));

import { buildCookie, fetchIsLive, toLiveTarget, toUniqueId } from "@/lib/tiktok/api";

describe("api", () => {
  beforeEach(() => {
    mockGet.mockReset();
  });

  describe("fetchIsLive", () => {
    it("is true when the room status is broadcasting", async () => {
      mockGet.mockResolvedValue({ data: { statusCode: 0, data: { liveRoom: { status: 2 } } } });
      const signal = new AbortController().signal;

      const live = await fetchIsLive(
        { key: "alice", username: "@alice", sessionId: "test-session", targetIdc: "us-eastred" },
        signal
      );

      expect(live).toBe(true);
      expect(mockGet).toHaveBeenCalledWith("https://www.tiktok.com/api-live/user/room/", {
        params: { aid: 1988, app_name: "tiktok_web", device_platform: "web_pc", uniqueId: "alice", sourceType: 54 },
        headers: { cookie: "sessionid=test-session; tt-target-idc=us-eastred" },
        signal,
      });
    });

    it("is false for an offline room", async () => {
      mockGet.mockResolvedValue({ data: { statusCode: 0, data: { liveRoom: { status: 4 } } } });

      const live = await fetchIsLive(
        { key: "bob", username: "bob", sessionId: null, targetIdc: null },
        new AbortController().signal
      );

      expect(live).toBe(false);
    });

    it("throws on a non-zero status code", async () => {
      mockGet.mockResolvedValue({ data: { statusCode: 19881007, message: "user_not_found" } });

      await expect(
        fetchIsLive({ key: "ghost", username: "@ghost", sessionId: null, targetIdc: null }, new AbortController().signal)
      ).rejects.toThrow("user_not_found");
    });
  });

  it("builds the cookie from whatever credentials are present", () => {
    expect(buildCookie({ sessionId: null, targetIdc: null })).toBe("");
    expect(buildCookie({ sessionId: null, targetIdc: "eu-ttp2" })).toBe("tt-target-idc=eu-ttp2");
  });

  it("strips the @ from handles", () => {
    expect(toUniqueId(" @alice ")).toBe("alice");
  });

  it("falls back to the global credential and routing hint", () => {
    expect(
      toLiveTarget(
        { key: "a", username: "@a", sessionId: null, targetIdc: "us-eastred" },
        { sessionId: "test-secret", targetIdc: "eu-ttp2" }
      )
    ).toEqual({ key: "a", username: "@a", sessionId: "test-secret", targetIdc: "us-eastred" });
  });
});
