/**
 * Tests for the session recorder state machine.
 */

import fs from "fs";
import path from "path";
import { describe, it, expect, beforeEach } from "vitest";
import TiktokLiveRecorder from "@/lib/tiktok/live-recorder";
import SessionLog from "@/lib/tiktok/session-log";
import { Tiktok } from "@/types/tiktok";
import { FakeEventClient, FakeVideoCapture, deferred, makeAccount, makeSettings, makeTempDir, readLines } from "../../helpers";

const AT = new Date(2024, 0, 15, 10, 30, 0);

describe("TiktokLiveRecorder", () => {
  let root: string;
  let outputDirectory: string;
  let client: FakeEventClient;
  let video: FakeVideoCapture;
  let sessionLog: SessionLog;

  beforeEach(async () => {
    root = await makeTempDir();
    outputDirectory = path.join(root, "recordings");
    client = new FakeEventClient();
    video = new FakeVideoCapture();
    sessionLog = new SessionLog(path.join(root, "logs"), AT);
  });

  function createRecorder(options: { connectTimeoutMs?: number; finalizeTimeoutMs?: number } = {}) {
    return new TiktokLiveRecorder({
      account: makeAccount("alice", { tags: ["research", "test"], notes: "note" }),
      settings: makeSettings({ outputDirectory }),
      client,
      video,
      sessionLog,
      now: () => AT,
      ...options,
    });
  }

  describe("recording to stream end", () => {
    it("writes routed events, finalizes on stream end and logs the session once", async () => {
      const recorder = createRecorder();
      const transitions: string[] = [];
      recorder.on("state-change", (from, to) => transitions.push(`${from}->${to}`));

      await recorder.start();
      expect(recorder.state).toBe(Tiktok.SessionState.RECORDING);

      client.push({
        type: "comment",
        user: { userId: "viewer1", nickname: "Viewer One" },
        comment: "hello, world",
        followerCount: 42,
      });
      client.push({
        type: "gift",
        user: { userId: "viewer2", nickname: "Viewer Two" },
        giftName: "Rose",
        repeatCount: 3,
        streakable: true,
        streaking: false,
      });
      client.push({ type: "unknown", kind: "like" });
      client.push({ type: "stream-end" });

      const summary = await recorder.done;

      expect(summary.finalState).toBe(Tiktok.SessionState.CLOSED);
      expect(summary.reason).toBe("stream_ended");
      expect(summary.stem).toBe("alice_20240115_103000");
      expect(summary.counters).toEqual({ comments: 1, gifts: 1, follows: 0, shares: 0, joins: 0, unknown: 1 });
      expect(recorder.state).toBe(Tiktok.SessionState.CLOSED);
      expect(transitions).toEqual([
        "idle->connecting",
        "connecting->recording",
        "recording->finalizing",
        "finalizing->closed",
      ]);

      expect(await readLines(path.join(outputDirectory, "alice_20240115_103000_comments.csv"))).toEqual([
        "timestamp,user_id,nickname,comment,follower_count",
        '2024-01-15T10:30:00.000,viewer1,Viewer One,"hello, world",42',
      ]);
      expect(await readLines(path.join(outputDirectory, "alice_20240115_103000_gifts.csv"))).toEqual([
        "timestamp,user_id,nickname,gift_name,repeat_count,streakable,streaking",
        "2024-01-15T10:30:00.000,viewer2,Viewer Two,Rose,3,true,false",
      ]);
      expect(await readLines(path.join(outputDirectory, "alice_20240115_103000_joins.csv"))).toEqual([
        "timestamp,user_id,nickname,count,is_top_user,enter_type,action,user_share_type,client_enter_source",
      ]);

      expect(await readLines(sessionLog.file)).toEqual([
        "account,username,start_time,end_time,duration_minutes,comments_count,gifts_count,follows_count,shares_count,joins_count,unknown_count,final_state,terminal_reason,tags,notes",
        "alice,@alice,2024-01-15T10:30:00.000,2024-01-15T10:30:00.000,0,1,1,0,0,0,1,closed,stream_ended,research;test,note",
      ]);

      expect(video.started).toEqual({
        input: "https://pull.test/live.flv",
        output: path.join(outputDirectory, "alice_20240115_103000.flv"),
      });
      expect(video.stops).toBe(1);
      expect(client.disconnects).toBe(1);
    });

    it("emits event-dropped for unrecognised kinds", async () => {
      const recorder = createRecorder();
      const dropped: string[] = [];
      recorder.on("event-dropped", (kind) => dropped.push(kind));

      await recorder.start();
      client.push({ type: "unknown", kind: "emote" });
      client.push({ type: "stream-end" });
      await recorder.done;

      expect(dropped).toEqual(["emote"]);
    });

    it("records events only when no stream URL is offered", async () => {
      client.connectResult = { roomId: "1", streamUrl: null };
      const recorder = createRecorder();

      await recorder.start();
      client.push({ type: "stream-end" });
      const summary = await recorder.done;

      expect(video.started).toBeNull();
      expect(summary.finalState).toBe(Tiktok.SessionState.CLOSED);
      expect(fs.existsSync(path.join(outputDirectory, "alice_20240115_103000_shares.csv"))).toBe(true);
    });
  });

  describe("file naming", () => {
    it("gives sessions that share a stem separate files", async () => {
      const first = { client: new FakeEventClient(), key: "team a", comment: "from team a" };
      const second = { client: new FakeEventClient(), key: "team_a", comment: "from team_a" };
      const recorders = [first, second].map(
        ({ client, key }) =>
          new TiktokLiveRecorder({
            account: makeAccount(key),
            settings: makeSettings({ outputDirectory }),
            client,
            video: new FakeVideoCapture(),
            sessionLog,
            now: () => AT,
          })
      );

      for (const recorder of recorders) await recorder.start();
      for (const { client, comment } of [first, second]) {
        client.push({ type: "comment", user: { userId: "u1", nickname: "n1" }, comment, followerCount: 0 });
        client.push({ type: "stream-end" });
      }
      const summaries = await Promise.all(recorders.map((recorder) => recorder.done));

      expect(summaries.map((summary) => summary.stem)).toEqual(["team_a_20240115_103000", "team_a_20240115_103000_2"]);
      expect(await readLines(path.join(outputDirectory, "team_a_20240115_103000_comments.csv"))).toEqual([
        "timestamp,user_id,nickname,comment,follower_count",
        "2024-01-15T10:30:00.000,u1,n1,from team a,0",
      ]);
      expect(await readLines(path.join(outputDirectory, "team_a_20240115_103000_2_comments.csv"))).toEqual([
        "timestamp,user_id,nickname,comment,follower_count",
        "2024-01-15T10:30:00.000,u1,n1,from team_a,0",
      ]);
    });
  });

  describe("terminal reasons", () => {
    it("finalizes with stream_error on a connection error event", async () => {
      const recorder = createRecorder();
      await recorder.start();

      client.push({ type: "connection-error", error: new Error("socket reset") });
      const summary = await recorder.done;

      expect(summary.reason).toBe("stream_error: socket reset");
      expect(summary.finalState).toBe(Tiktok.SessionState.CLOSED);
    });

    it("finalizes with io_error when video capture fails", async () => {
      const recorder = createRecorder();
      await recorder.start();

      video.emit("error", new Error("ffmpeg exited with code 1"));
      const summary = await recorder.done;

      expect(summary.reason).toBe("io_error: video ffmpeg exited with code 1");
    });

    it("keeps the first reason when several arrive", async () => {
      const recorder = createRecorder();
      await recorder.start();

      const done = recorder.stop("disabled via config");
      client.push({ type: "stream-end" });
      await recorder.stop("shutdown: later");

      expect((await done).reason).toBe("disabled via config");
    });

    it("ignores events pushed after stop", async () => {
      const recorder = createRecorder();
      await recorder.start();

      const done = recorder.stop("removed from config");
      client.push({
        type: "comment",
        user: { userId: "late", nickname: "Late" },
        comment: "too late",
        followerCount: 0,
      });
      const summary = await done;

      expect(summary.counters.comments).toBe(0);
      expect(await readLines(path.join(outputDirectory, "alice_20240115_103000_comments.csv"))).toEqual([
        "timestamp,user_id,nickname,comment,follower_count",
      ]);
    });
  });

  describe("connect failures", () => {
    it("fails without opening any file and logs a failed row", async () => {
      client.connectError = new Error("room offline");
      const recorder = createRecorder();

      await recorder.start();
      const summary = await recorder.done;

      expect(recorder.state).toBe(Tiktok.SessionState.FAILED);
      expect(summary.finalState).toBe(Tiktok.SessionState.FAILED);
      expect(summary.reason).toBe("connect_error: room offline");
      expect(fs.existsSync(outputDirectory)).toBe(false);
      expect(client.disconnects).toBe(1);

      const rows = await readLines(sessionLog.file);
      expect(rows).toHaveLength(2);
      expect(rows[1]).toBe(
        "alice,@alice,2024-01-15T10:30:00.000,2024-01-15T10:30:00.000,0,0,0,0,0,0,0,failed,connect_error: room offline,research;test,note"
      );
    });

    it("fails when connect outlives the connect timeout", async () => {
      client.connectGate = new Promise<void>(() => undefined);
      const recorder = createRecorder({ connectTimeoutMs: 20 });

      await recorder.start();

      expect((await recorder.done).reason).toBe("connect_error: connect timed out after 20ms");
    });

    it("honours a stop requested while connecting", async () => {
      const gate = deferred();
      client.connectGate = gate.promise;
      const recorder = createRecorder();

      const starting = recorder.start();
      expect(recorder.state).toBe(Tiktok.SessionState.CONNECTING);

      const done = recorder.stop("removed from config");
      gate.resolve();
      await starting;
      const summary = await done;

      expect(summary.finalState).toBe(Tiktok.SessionState.CLOSED);
      expect(summary.reason).toBe("removed from config");
      expect(fs.existsSync(outputDirectory)).toBe(false);
      expect(client.disconnects).toBe(1);
    });
  });

  describe("bounded finalize", () => {
    it("kills a video capture that does not stop in time", async () => {
      video.hangOnStop = true;
      const recorder = createRecorder({ finalizeTimeoutMs: 20 });
      await recorder.start();

      const summary = await recorder.stop("shutdown: test");

      expect(summary.finalState).toBe(Tiktok.SessionState.CLOSED);
      expect(video.kills).toBe(1);
      expect(await readLines(sessionLog.file)).toHaveLength(2);
    });
  });
});
