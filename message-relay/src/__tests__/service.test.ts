import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { RelayService, type RelayServiceOptions } from "../service";
import { RelayStore } from "../db/store";
import { ConversationNotFound, ValidationError } from "../errors";
import { FakeConnection } from "./fakes";
import type { MessageContent } from "../types";

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

const DM = "dm:alice:bob";

function text(value: string): MessageContent {
  return { kind: "text", text: value };
}

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

describe("RelayService", () => {
  let store: RelayStore;
  let service: RelayService;
  let clock: { now: number };

  async function connect(userId: string): Promise<FakeConnection> {
    const connection = new FakeConnection(userId);
    await service.connect(userId, connection);
    return connection;
  }

  beforeEach(() => {
    clock = { now: 1_700_000_000_000 };
    store = new RelayStore(":memory:");
    store.init();
    const options: RelayServiceOptions = {
      heartbeat: { intervalMs: 1_000, timeoutMs: 3_000 },
      delivery: { pushTimeoutMs: 200, backlogLimit: 100, backlogMaxAgeMs: 60_000 },
      cache: { capacity: 50, maxConversations: 10 },
      pagination: { defaultLimit: 20, maxLimit: 100 },
      typing: { ttlMs: 5_000, reannounceMs: 3_000, sweepIntervalMs: 1_000 },
      clock: () => clock.now,
    };
    service = new RelayService(store, options);
  });

  afterEach(async () => {
    await service.stop();
    store.close();
  });

  // ----- presence -----

  describe("presence", () => {
    it("announces online and offline to users sharing a conversation", async () => {
      await service.submit(DM, "alice", text("hi"));
      const alice = await connect("alice");

      const bob = await connect("bob");
      clock.now += 500;
      service.disconnect("bob", bob);
      await service.engine.flush();

      expect(alice.ofType("presence_changed")).toEqual([
        { type: "presence_changed", userId: "bob", status: "online", lastSeen: 1_700_000_000_000 },
        { type: "presence_changed", userId: "bob", status: "offline", lastSeen: 1_700_000_000_500 },
      ]);
      expect(bob.ofType("presence_changed")).toEqual([]);
    });

    it("stays online while any device is connected", async () => {
      await service.submit(DM, "alice", text("hi"));
      const alice = await connect("alice");

      const phone = await connect("bob");
      await connect("bob");
      service.disconnect("bob", phone);
      await service.engine.flush();

      expect(alice.ofType("presence_changed").map((e) => e.status)).toEqual(["online"]);
      expect(service.presenceOf(["bob"])[0].status).toBe("online");
    });

    it("says nothing to users without a shared conversation", async () => {
      await service.submit(DM, "alice", text("hi"));
      const carol = await connect("carol");

      await connect("alice");
      await connect("bob");
      await service.engine.flush();

      expect(carol.received).toEqual([]);
    });

    it("starts sharing typing once a first direct message creates the conversation", async () => {
      const alice = await connect("alice");
      await connect("bob");

      await service.submit(DM, "alice", text("hello?"));
      await service.setTyping("bob", DM);
      await service.submit(DM, "bob", text("hey"));
      await service.engine.flush();

      expect(alice.ofType("typing_changed")).toEqual([
        { type: "typing_changed", userId: "bob", conversationId: DM, active: true },
        { type: "typing_changed", userId: "bob", conversationId: DM, active: false },
      ]);
      expect(alice.messageIds()).toHaveLength(1);
    });

    it("reports presence records, once per user", async () => {
      await connect("alice");

      expect(service.presenceOf(["alice", "zed", "alice"])).toEqual([
        { userId: "alice", status: "online", lastSeen: 1_700_000_000_000, typing: [] },
        { userId: "zed", status: "offline", lastSeen: null, typing: [] },
      ]);
    });

    it("rejects typing from a non-member", async () => {
      service.createGroup("g1", "alice", ["bob"]);
      await expect(service.setTyping("carol", "group:g1")).rejects.toBeInstanceOf(ValidationError);
    });
  });

  // ----- history -----

  it("only lets members read history", async () => {
    const sent = await service.submit(DM, "alice", text("hi"));

    const page = await service.page(DM, "bob");
    expect(page.messages.map((m) => m.id)).toEqual([sent.id]);
    await expect(service.page(DM, "carol")).rejects.toThrow("carol is not a member of dm:alice:bob");
    await expect(service.cursorAt(DM, "carol", sent.id, "forward")).rejects.toBeInstanceOf(
      ValidationError,
    );
  });

  // ----- groups -----

  describe("groups", () => {
    it("creates a group with the creator and unique members", async () => {
      const summary = service.createGroup("standup", "alice", ["bob", "carol", "bob", ""]);

      expect(summary).toMatchObject({
        id: "group:standup",
        kind: "group",
        lastMessageAt: null,
        messageCount: 0,
      });
      expect(await store.membersOf("group:standup")).toEqual(["alice", "bob", "carol"]);
      expect(() => service.createGroup("standup", "alice", [])).toThrow("already exists");
      expect(() => service.createGroup("a:b", "alice", [])).toThrow(ValidationError);
    });

    it("adds and removes members", async () => {
      service.createGroup("standup", "alice", []);

      expect(service.addMember("group:standup", "bob")).toBe(true);
      expect(service.addMember("group:standup", "bob")).toBe(false);
      expect(service.removeMember("group:standup", "bob")).toBe(true);
      expect(service.removeMember("group:standup", "bob")).toBe(false);

      expect(() => service.addMember("group:missing", "bob")).toThrow(ConversationNotFound);
      expect(() => service.addMember(DM, "carol")).toThrow("dm:alice:bob is not a group");
    });

    it("shares presence among online members as soon as the group exists", async () => {
      const alice = await connect("alice");
      const bob = await connect("bob");

      service.createGroup("standup", "alice", ["bob"]);
      service.disconnect("bob", bob);
      await service.engine.flush();

      expect(alice.ofType("presence_changed").map((e) => [e.userId, e.status])).toEqual([
        ["bob", "offline"],
      ]);
    });
  });

  describe("membership notices", () => {
    it("tells every affected online member about creation, joins and removals", async () => {
      const alice = await connect("alice");
      const bob = await connect("bob");
      const carol = await connect("carol");

      service.createGroup("standup", "alice", ["bob"]);
      service.addMember("group:standup", "carol");
      service.addMember("group:standup", "carol");
      service.removeMember("group:standup", "bob");
      await service.engine.flush();

      const changes = (c: FakeConnection) =>
        c.ofType("membership_changed").map((e) => [e.change, e.userId, e.members]);

      expect(changes(alice)).toEqual([
        ["created", "alice", ["alice", "bob"]],
        ["member_added", "carol", ["alice", "bob", "carol"]],
        ["member_removed", "bob", ["alice", "carol"]],
      ]);
      expect(changes(bob)).toEqual([
        ["created", "alice", ["alice", "bob"]],
        ["member_added", "carol", ["alice", "bob", "carol"]],
        ["member_removed", "bob", ["alice", "carol"]],
      ]);
      expect(changes(carol)).toEqual([
        ["member_added", "carol", ["alice", "bob", "carol"]],
        ["member_removed", "bob", ["alice", "carol"]],
      ]);
    });

    it("stays quiet when nothing changed", async () => {
      service.createGroup("standup", "alice", []);
      const bob = await connect("bob");

      service.removeMember("group:standup", "bob");
      await service.engine.flush();

      expect(bob.ofType("membership_changed")).toEqual([]);
    });
  });

  // ----- conversation list -----

  it("lists a user's conversations with unread counts", async () => {
    await service.submit(DM, "alice", text("one"));
    await service.submit(DM, "alice", text("two"));
    service.createGroup("standup", "alice", ["bob"]);

    const listed = service.listConversations("bob");
    expect(listed.map((c) => [c.id, c.unreadCount])).toEqual([
      ["group:standup", 0],
      [DM, 2],
    ]);
    expect(service.listConversations("carol")).toEqual([]);
    expect(() => service.listConversations("")).toThrow(ValidationError);
  });

  // ----- health and lifecycle -----

  it("reports health", async () => {
    await service.submit(DM, "alice", text("hi"));
    await connect("alice");

    expect(service.healthCheck()).toEqual({
      ok: true,
      messageCount: 1,
      conversationCount: 1,
      onlineUsers: 1,
      connections: 1,
      cachedConversations: 0,
    });
  });

  it("takes everyone offline on stop", async () => {
    await connect("alice");
    await service.stop();

    expect(service.registry.connectionCount()).toBe(0);
    expect(service.presenceOf(["alice"])[0].status).toBe("offline");
  });
});
