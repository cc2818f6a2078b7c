import request from "@/utils/http";
import type { LiveTarget } from "@/types/tiktok";

type BaseResponse<T> = {
  statusCode: number;
  message?: string;
  data?: T;
};

type RoomUserInfo = {
  user?: { id?: string; uniqueId?: string; roomId?: string };
  liveRoom?: { status?: number; title?: string; startTime?: number };
};

// liveRoom.status: 2 = broadcasting, 4 = offline
const ROOM_STATUS_LIVE = 2;

function checkResponseCode<T>(resp: BaseResponse<T>) {
  if (resp.statusCode !== 0) throw new Error(resp.message || `statusCode ${resp.statusCode}`);
}

export function buildCookie(target: Pick<LiveTarget, "sessionId" | "targetIdc">) {
  const parts: string[] = [];
  if (target.sessionId) parts.push(`sessionid=${target.sessionId}`);
  if (target.targetIdc) parts.push(`tt-target-idc=${target.targetIdc}`);
  return parts.join("; ");
}

export function toUniqueId(username: string) {
  return username.trim().replace(/^@/, "");
}

export async function getRoomUserInfo(target: LiveTarget, signal?: AbortSignal) {
  const cookie = buildCookie(target);
  const resp = await request.get<BaseResponse<RoomUserInfo>>("https://www.tiktok.com/api-live/user/room/", {
    params: {
      aid: 1988,
      app_name: "tiktok_web",
      device_platform: "web_pc",
      uniqueId: toUniqueId(target.username),
      sourceType: 54,
    },
    headers: cookie ? { cookie } : undefined,
    signal,
  });

  checkResponseCode(resp.data);

  return resp.data.data ?? {};
}

export async function fetchIsLive(target: LiveTarget, signal: AbortSignal) {
  const info = await getRoomUserInfo(target, signal);
  return info.liveRoom?.status === ROOM_STATUS_LIVE;
}

/** Per-account credential and routing hint, falling back to the global ones. */
export function toLiveTarget(
  account: Pick<LiveTarget, "key" | "username" | "sessionId" | "targetIdc">,
  settings: Pick<LiveTarget, "sessionId" | "targetIdc">
): LiveTarget {
  return {
    key: account.key,
    username: account.username,
    sessionId: account.sessionId ?? settings.sessionId,
    targetIdc: account.targetIdc ?? settings.targetIdc,
  };
}
