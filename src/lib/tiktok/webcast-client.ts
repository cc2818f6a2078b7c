import { WebcastPushConnection } from "tiktok-live-connector";
import { z } from "zod";
import logger from "@/logger";
import { buildCookie, toUniqueId } from "./api";
import { ConnectError } from "./errors";
import type { LiveConnectionInfo, LiveEvent, LiveEventClient, LiveTarget, LiveUser } from "@/types/tiktok";

const text = (fallback = "") => z.union([z.string(), z.number()]).transform(String).catch(fallback);
const num = z.coerce.number().catch(0);
const flag = z.boolean().catch(false);

const userSchema = z.object({
  uniqueId: text(),
  nickname: text(),
});

const chatSchema = userSchema.extend({
  comment: text(),
  followInfo: z.object({ followerCount: num }).catch({ followerCount: 0 }),
});

const giftSchema = userSchema.extend({
  giftName: text(),
  repeatCount: num,
  repeatEnd: flag,
  giftType: num,
});

const followSchema = userSchema.extend({
  followInfo: z.object({ followerCount: num }).catch({ followerCount: 0 }),
  shareType: num,
  actionId: num,
});

const shareSchema = userSchema.extend({
  shareType: num,
  shareTarget: text("unknown"),
  shareCount: num,
  usersJoined: num,
  actionId: num,
});

const memberSchema = userSchema.extend({
  memberCount: num,
  isTopUser: flag,
  enterType: num,
  actionId: num,
  userShareType: text(),
  clientEnterSource: text(),
});

const roomInfoSchema = z
  .object({
    stream_url: z
      .object({
        flv_pull_url: z.record(z.string()).catch({}),
        rtmp_pull_url: z.string().catch(""),
      })
      .partial()
      .nullish(),
  })
  .catch({});

const connectionStateSchema = z
  .object({ roomId: text(), roomInfo: z.unknown() })
  .catch({ roomId: "", roomInfo: undefined });

const connectorErrorSchema = z
  .object({
    info: text(),
    exception: z.object({ message: text() }).nullish().catch(null),
  })
  .catch({ info: "", exception: null });

// best quality first
const FLV_QUALITY_ORDER = ["FULL_HD1", "HD1", "SD1", "SD2"];

// payloads the monitor does not record; counted as unknown
const IGNORED_EVENTS = [
  "like",
  "emote",
  "envelope",
  "questionNew",
  "linkMicBattle",
  "linkMicArmies",
  "liveIntro",
  "subscribe",
  "roomUser",
];

function asPayload(data: unknown): object {
  return typeof data === "object" && data !== null ? data : {};
}

function toUser(data: z.infer<typeof userSchema>): LiveUser {
  return { userId: data.uniqueId, nickname: data.nickname };
}

/** Maps a raw connector payload onto a `LiveEvent`. */
export function normalizeWebcastEvent(kind: string, data: unknown): LiveEvent {
  switch (kind) {
    case "chat": {
      const chat = chatSchema.parse(asPayload(data));
      return { type: "comment", user: toUser(chat), comment: chat.comment, followerCount: chat.followInfo.followerCount };
    }
    case "gift": {
      const gift = giftSchema.parse(asPayload(data));
      // giftType 1 is a streakable gift; the streak is over once repeatEnd arrives
      const streakable = gift.giftType === 1;
      return {
        type: "gift",
        user: toUser(gift),
        giftName: gift.giftName,
        repeatCount: gift.repeatCount,
        streakable,
        streaking: streakable && !gift.repeatEnd,
      };
    }
    case "follow": {
      const follow = followSchema.parse(asPayload(data));
      return {
        type: "follow",
        user: toUser(follow),
        followCount: follow.followInfo.followerCount,
        shareType: follow.shareType,
        action: follow.actionId,
      };
    }
    case "share": {
      const share = shareSchema.parse(asPayload(data));
      return {
        type: "share",
        user: toUser(share),
        shareType: share.shareType,
        shareTarget: share.shareTarget,
        shareCount: share.shareCount,
        usersJoined: share.usersJoined,
        action: share.actionId,
      };
    }
    case "member": {
      const member = memberSchema.parse(asPayload(data));
      return {
        type: "join",
        user: toUser(member),
        count: member.memberCount,
        isTopUser: member.isTopUser,
        enterType: member.enterType,
        action: member.actionId,
        userShareType: member.userShareType,
        clientEnterSource: member.clientEnterSource,
      };
    }
    default:
      return { type: "unknown", kind };
  }
}

export function pickStreamUrl(roomInfo: unknown): string | null {
  const streamUrl = roomInfoSchema.parse(roomInfo ?? {}).stream_url;
  if (!streamUrl) return null;

  const flv = streamUrl.flv_pull_url ?? {};
  for (const quality of FLV_QUALITY_ORDER) {
    if (flv[quality]) return flv[quality];
  }

  const first = Object.values(flv).find((url) => url.length > 0);
  return first ?? (streamUrl.rtmp_pull_url || null);
}

export interface WebcastConnectionOptions {
  processInitialData?: boolean;
  enableExtendedGiftInfo?: boolean;
  requestPollingIntervalMs?: number;
  sessionId?: string;
  requestHeaders?: Record<string, string>;
  websocketHeaders?: Record<string, string>;
  signProviderOptions?: { host: string };
}

/** The part of `WebcastPushConnection` the client drives. */
export interface WebcastConnection {
  on(event: string, listener: (...args: unknown[]) => void): unknown;
  connect(): Promise<unknown>;
  disconnect(): void;
}

export type WebcastConnectionFactory = (uniqueId: string, options: WebcastConnectionOptions) => WebcastConnection;

export interface WebcastEventClientOptions {
  /** Sign server host, e.g. "tiktok.eulerstream.com". */
  signServer?: string | null;
  createConnection?: WebcastConnectionFactory;
}

const createPushConnection: WebcastConnectionFactory = (uniqueId, options) =>
  new WebcastPushConnection(uniqueId, options);

/** Turns "{info, exception}" error payloads into one line. */
export function describeConnectorError(payload: unknown): string {
  if (payload instanceof Error) return payload.message;
  if (typeof payload === "string") return payload;

  const { info, exception } = connectorErrorSchema.parse(payload ?? {});
  return [info, exception?.message].filter(Boolean).join(": ") || "unknown connector error";
}

function toSignProviderHost(host: string) {
  const url = /^https?:\/\//.test(host) ? host : `https://${host}`;
  return url.endsWith("/") ? url : `${url}/`;
}

/** `LiveEventClient` backed by tiktok-live-connector's push connection. */
export default class WebcastEventClient implements LiveEventClient {
  private target: LiveTarget;
  private signServer: string | null;
  private createConnection: WebcastConnectionFactory;
  private connection: WebcastConnection | null = null;
  private closing = false;

  constructor(target: LiveTarget, options: WebcastEventClientOptions = {}) {
    this.target = target;
    this.signServer = options.signServer ?? null;
    this.createConnection = options.createConnection ?? createPushConnection;
  }

  async connect(onEvent: (event: LiveEvent) => void): Promise<LiveConnectionInfo> {
    const cookie = buildCookie({ sessionId: null, targetIdc: this.target.targetIdc });
    const options: WebcastConnectionOptions = {
      processInitialData: false,
      enableExtendedGiftInfo: false,
      requestPollingIntervalMs: 1000,
      sessionId: this.target.sessionId ?? undefined,
      requestHeaders: cookie ? { cookie } : undefined,
      websocketHeaders: cookie ? { cookie } : undefined,
    };
    if (this.signServer) options.signProviderOptions = { host: toSignProviderHost(this.signServer) };

    const connection = this.createConnection(toUniqueId(this.target.username), options);
    this.connection = connection;

    for (const kind of ["chat", "gift", "follow", "share", "member", ...IGNORED_EVENTS]) {
      connection.on(kind, (data: unknown) => onEvent(normalizeWebcastEvent(kind, data)));
    }
    connection.on("streamEnd", () => onEvent({ type: "stream-end" }));
    // upgrade, polling and decode failures are recovered by the connector; loss arrives as "disconnected"
    connection.on("error", (err: unknown) => {
      logger.warn("[Webcast Client]", `${this.target.username} ${describeConnectorError(err)}`);
    });
    connection.on("disconnected", () => {
      if (this.closing) return;
      onEvent({ type: "connection-error", error: new Error("connection lost") });
    });

    let state: unknown;
    try {
      state = await connection.connect();
    } catch (error) {
      throw new ConnectError(this.target.key, describeConnectorError(error), { cause: error });
    }

    // disconnect() is a no-op until the connector is connected, so a late connect is closed here
    if (this.closing) {
      connection.disconnect();
      throw new ConnectError(this.target.key, "disconnected while connecting");
    }

    const { roomId, roomInfo } = connectionStateSchema.parse(state);
    return { roomId, streamUrl: pickStreamUrl(roomInfo) };
  }

  async disconnect(): Promise<void> {
    this.closing = true;
    this.connection?.disconnect();
  }
}
