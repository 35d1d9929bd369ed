import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { buildEngine, FakeConnection, SlowFillStore, type EngineHarness } from "./fakes";
import {
  MembershipSnapshotUnavailable,
  MessageNotFound,
  PersistenceFailure,
  ValidationError,
} from "../errors";
import type { Message, MessageContent, RecipientDelivery, UserId } from "../types";

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

const DM = "dm:alice:bob";

function text(value: string): MessageContent {
  return { kind: "text", text: value };
}

function deliveryOf(message: Message | null, recipientId: UserId): RecipientDelivery | undefined {
  return message?.deliveries.find((d) => d.recipientId === recipientId);
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/** Small deterministic PRNG for interleaving tests. */
function mulberry32(seed: number): () => number {
  let a = seed;
  return () => {
    a = (a + 0x6d2b79f5) | 0;
    let t = Math.imul(a ^ (a >>> 15), 1 | a);
    t = (t + Math.imul(t ^ (t >>> 7), 61 | t)) ^ t;
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

describe("DeliveryEngine", () => {
  let h: EngineHarness;

  beforeEach(() => {
    h = buildEngine();
  });

  afterEach(async () => {
    await h.engine.flush();
    h.close();
    vi.restoreAllMocks();
  });

  // ----- submit -----

  describe("submit", () => {
    it("persists the message in sent for every other member of the snapshot", async () => {
      h.store.createGroup("group:trio", ["u0", "u1", "u2"]);

      const message = await h.engine.submit("group:trio", "u0", text("hi"));

      expect(message.senderId).toBe("u0");
      expect(message.createdAt).toBe(h.clock.now);
      expect(message.deliveries.map((d) => [d.recipientId, d.status])).toEqual([
        ["u1", "sent"],
        ["u2", "sent"],
      ]);
      expect(await h.store.getMessage(message.id)).toEqual(message);
    });

    it("pushes to online recipients and leaves offline ones in sent until they connect", async () => {
      h.store.createGroup("group:trio", ["u0", "u1", "u2"]);
      const sender = h.connect("u0");
      const u1 = h.connect("u1");

      const message = await h.engine.submit("group:trio", "u0", text("hi"));
      await h.engine.flush();

      expect(u1.messageIds()).toEqual([message.id]);
      expect(sender.messageIds()).toEqual([]);
      // Pushed but not acknowledged: still sent.
      expect(deliveryOf(await h.store.getMessage(message.id), "u1")?.status).toBe("sent");

      expect(await h.engine.acknowledgeDelivered(message.id, "u1")).toBe("applied");

      const u2 = h.connect("u2");
      await h.engine.flush();
      expect(u2.messageIds()).toEqual([message.id]);
      expect(deliveryOf(await h.store.getMessage(message.id), "u2")?.status).toBe("sent");

      expect(await h.engine.acknowledgeDelivered(message.id, "u2")).toBe("applied");
      await h.engine.flush();

      const stored = await h.store.getMessage(message.id);
      expect(stored?.deliveries.map((d) => d.status)).toEqual(["delivered", "delivered"]);
      expect(
        sender.ofType("status_changed").map((e) => [e.recipientId, e.status]),
      ).toEqual([
        ["u1", "delivered"],
        ["u2", "delivered"],
      ]);
    });

    it("clears the sender's typing indicator in that conversation", async () => {
      h.presence.setTyping("alice", DM);
      await h.engine.submit(DM, "alice", text("done typing"));
      expect(h.presence.isTyping("alice", DM)).toBe(false);
    });

    it("surfaces a failed append and pushes nothing", async () => {
      vi.spyOn(h.store, "append").mockRejectedValueOnce(new Error("disk full"));
      const bob = h.connect("bob");
      await h.cache.warm(DM);

      const attempt = h.engine.submit(DM, "alice", text("hi"));
      await expect(attempt).rejects.toBeInstanceOf(PersistenceFailure);
      await expect(attempt).rejects.toMatchObject({ retryable: true });
      await h.engine.flush();

      expect(bob.received).toEqual([]);
      expect(await h.cache.get(DM)).toEqual([]);
      expect(h.store.getStats().messageCount).toBe(0);
    });

    it("fails as retryable when the membership snapshot is unavailable", async () => {
      vi.spyOn(h.store, "membersOf").mockRejectedValueOnce(new Error("directory down"));

      const attempt = h.engine.submit("group:g1", "alice", text("hi"));
      await expect(attempt).rejects.toBeInstanceOf(MembershipSnapshotUnavailable);
      await expect(attempt).rejects.toMatchObject({ retryable: true });
      expect(h.store.getStats().messageCount).toBe(0);
    });

    it("rejects a sender outside the conversation", async () => {
      h.store.createGroup("group:g1", ["alice", "bob"]);
      await expect(h.engine.submit("group:g1", "carol", text("hi"))).rejects.toThrow(
        "carol is not a member of group:g1",
      );
    });

    it("rejects malformed input", async () => {
      await expect(h.engine.submit("nonsense", "alice", text("hi"))).rejects.toBeInstanceOf(
        ValidationError,
      );
      await expect(h.engine.submit(DM, "alice", text("   "))).rejects.toThrow("text is required");
      await expect(
        h.engine.submit(DM, "alice", { kind: "media", mediaType: "image", mediaId: "" }),
      ).rejects.toThrow("mediaId is required");
    });

    it("excludes members removed before the send and skips members added after", async () => {
      h.store.createGroup("group:g1", ["alice", "bob", "carol"]);
      h.store.removeMember("group:g1", "carol");

      const message = await h.engine.submit("group:g1", "alice", text("hi"));
      h.store.addMember("group:g1", "dave");

      const stored = await h.store.getMessage(message.id);
      expect(stored?.deliveries.map((d) => d.recipientId)).toEqual(["bob"]);

      const dave = h.connect("dave");
      await h.engine.flush();
      expect(dave.received).toEqual([]);
    });
  });

  // ----- acknowledgements -----

  describe("acknowledgements", () => {
    it("treats a repeated delivered acknowledgement as stale", async () => {
      const message = await h.engine.submit(DM, "alice", text("hi"));

      h.clock.now += 10;
      expect(await h.engine.acknowledgeDelivered(message.id, "bob")).toBe("applied");
      const first = deliveryOf(await h.store.getMessage(message.id), "bob");

      h.clock.now += 10;
      expect(await h.engine.acknowledgeDelivered(message.id, "bob")).toBe("stale");
      expect(deliveryOf(await h.store.getMessage(message.id), "bob")).toEqual(first);
      expect(first?.deliveredAt).toBe(message.createdAt + 10);
    });

    it("records delivered before read when the read arrives first", async () => {
      const alice = h.connect("alice");
      const message = await h.engine.submit(DM, "alice", text("hi"));

      h.clock.now += 5;
      expect(await h.engine.acknowledgeRead(message.id, "bob")).toBe("applied");
      await h.engine.flush();

      expect(deliveryOf(await h.store.getMessage(message.id), "bob")).toEqual({
        recipientId: "bob",
        status: "read",
        sentAt: message.createdAt,
        deliveredAt: message.createdAt + 5,
        readAt: message.createdAt + 5,
      });
      expect(alice.ofType("status_changed").map((e) => e.status)).toEqual(["delivered", "read"]);
    });

    it("never regresses a read message", async () => {
      const message = await h.engine.submit(DM, "alice", text("hi"));
      await h.engine.acknowledgeRead(message.id, "bob");

      expect(await h.engine.acknowledgeDelivered(message.id, "bob")).toBe("stale");
      expect(await h.engine.acknowledgeRead(message.id, "bob")).toBe("stale");
      expect(deliveryOf(await h.store.getMessage(message.id), "bob")?.status).toBe("read");
    });

    it("rejects unknown messages and non-recipients", async () => {
      const message = await h.engine.submit(DM, "alice", text("hi"));

      await expect(h.engine.acknowledgeDelivered("missing", "bob")).rejects.toBeInstanceOf(
        MessageNotFound,
      );
      await expect(h.engine.acknowledgeRead(message.id, "alice")).rejects.toThrow(
        "alice is not a recipient",
      );
    });

    it("keeps every recorded sequence a prefix of sent, delivered, read", async () => {
      for (let seed = 1; seed <= 20; seed++) {
        const run = buildEngine();
        const random = mulberry32(seed);
        const recipients = ["r1", "r2", "r3"];
        run.store.createGroup("group:prop", ["host", ...recipients]);
        const host = run.connect("host");

        const messages = [
          await run.engine.submit("group:prop", "host", text("one")),
          await run.engine.submit("group:prop", "host", text("two")),
        ];

        const ops = Array.from({ length: 14 }, () => ({
          read: random() < 0.5,
          message: messages[Math.floor(random() * messages.length)],
          recipient: recipients[Math.floor(random() * recipients.length)],
        }));
        await Promise.all(
          ops.map((op) =>
            op.read
              ? run.engine.acknowledgeRead(op.message.id, op.recipient)
              : run.engine.acknowledgeDelivered(op.message.id, op.recipient),
          ),
        );
        await run.engine.flush();

        const events = new Map<string, string[]>();
        for (const e of host.ofType("status_changed")) {
          const key = `${e.messageId}:${e.recipientId}`;
          events.set(key, [...(events.get(key) ?? []), e.status]);
        }

        for (const message of messages) {
          const stored = await run.store.getMessage(message.id);
          for (const recipient of recipients) {
            const d = deliveryOf(stored, recipient);
            const seen = [...(events.get(`${message.id}:${recipient}`) ?? [])].sort();
            const touched = ops.filter((op) => op.message === message && op.recipient === recipient);

            if (d?.status === "read") {
              expect(d.deliveredAt).not.toBeNull();
              expect(d.readAt).not.toBeNull();
              expect(seen).toEqual(["delivered", "read"]);
              expect(touched.some((op) => op.read)).toBe(true);
            } else if (d?.status === "delivered") {
              expect(d.deliveredAt).not.toBeNull();
              expect(d.readAt).toBeNull();
              expect(seen).toEqual(["delivered"]);
              expect(touched.some((op) => op.read)).toBe(false);
            } else {
              expect(d?.status).toBe("sent");
              expect(d?.deliveredAt).toBeNull();
              expect(seen).toEqual([]);
              expect(touched).toEqual([]);
            }
          }
        }
        run.close();
      }
    });

    it("marks a whole conversation read", async () => {
      const alice = h.connect("alice");
      const m1 = await h.engine.submit(DM, "alice", text("one"));
      await h.engine.submit(DM, "alice", text("two"));
      await h.engine.submit(DM, "alice", text("three"));
      await h.engine.acknowledgeDelivered(m1.id, "bob");

      expect(await h.engine.markConversationRead(DM, "bob")).toBe(3);
      expect(await h.engine.markConversationRead(DM, "bob")).toBe(0);
      await h.engine.flush();

      const page = await h.pagination.page(DM, { bypassCache: true });
      expect(page.messages.map((m) => deliveryOf(m, "bob")?.status)).toEqual([
        "read",
        "read",
        "read",
      ]);
      expect(alice.ofType("status_changed")).toHaveLength(6);
    });
  });

  // ----- fan-out -----

  describe("fan-out", () => {
    it("isolates a permanently failing member from the rest of the group", async () => {
      const members = ["m1", "m2", "m3", "m4", "m5"];
      h.store.createGroup("group:five", ["host", ...members]);
      const connections = new Map(members.map((m) => [m, h.connect(m)]));
      const broken = connections.get("m5");
      if (!broken) throw new Error("missing connection");
      broken.failSends = true;

      const message = await h.engine.submit("group:five", "host", text("standup"));
      await h.engine.flush();

      for (const member of ["m1", "m2", "m3", "m4"]) {
        expect(connections.get(member)?.messageIds()).toEqual([message.id]);
        expect(await h.engine.acknowledgeDelivered(message.id, member)).toBe("applied");
      }

      expect(broken.closed).toBe(true);
      expect(h.registry.isOnline("m5")).toBe(false);

      const stored = await h.store.getMessage(message.id);
      expect(stored?.deliveries.map((d) => [d.recipientId, d.status])).toEqual([
        ["m1", "delivered"],
        ["m2", "delivered"],
        ["m3", "delivered"],
        ["m4", "delivered"],
        ["m5", "sent"],
      ]);
      const backlog = await h.store.pendingFor("m5", { limit: 10, since: 0 });
      expect(backlog.map((m) => m.id)).toEqual([message.id]);
    });

    it("reaches every device of a recipient", async () => {
      const phone = h.connect("bob");
      const laptop = h.connect("bob");

      const message = await h.engine.submit(DM, "alice", text("hi"));
      await h.engine.flush();

      expect(phone.messageIds()).toEqual([message.id]);
      expect(laptop.messageIds()).toEqual([message.id]);
    });

    it("delivers concurrent submits to each connection in creation order", async () => {
      const bob = h.connect("bob");
      const latencies = [4, 0, 2];
      let frame = 0;
      bob.latencyMs = () => latencies[frame++ % latencies.length];
      const realAppend = h.store.append.bind(h.store);
      const delays = [15, 0, 10, 5, 1];
      let call = 0;
      vi.spyOn(h.store, "append").mockImplementation(async (message) => {
        await sleep(delays[call++ % delays.length]);
        return realAppend(message);
      });

      const sent = await Promise.all(
        [1, 2, 3, 4, 5].map((n) => h.engine.submit(DM, "alice", text(`#${n}`))),
      );
      await h.engine.flush();

      expect(sent.map((m) => (m.content.kind === "text" ? m.content.text : ""))).toEqual([
        "#1",
        "#2",
        "#3",
        "#4",
        "#5",
      ]);
      expect(bob.messageIds()).toEqual(sent.map((m) => m.id));
      expect([...bob.messageIds()].sort()).toEqual(bob.messageIds());
    });

    it("abandons a push that exceeds the timeout and keeps the state", async () => {
      const timed = buildEngine({ pushTimeoutMs: 20 });
      const bob = timed.connect("bob");
      bob.stallSends = true;

      const message = await timed.engine.submit(DM, "alice", text("hi"));
      await timed.engine.flush();

      expect(bob.closed).toBe(true);
      expect(timed.registry.isOnline("bob")).toBe(false);
      expect(deliveryOf(await timed.store.getMessage(message.id), "bob")?.status).toBe("sent");
      timed.close();
    });
  });

  // ----- redelivery -----

  describe("redelivery", () => {
    it("replays the backlog in order on connect, and not again once acknowledged", async () => {
      const sent = [
        await h.engine.submit(DM, "alice", text("one")),
        await h.engine.submit(DM, "alice", text("two")),
        await h.engine.submit(DM, "alice", text("three")),
      ];

      const bob = h.connect("bob");
      await h.engine.flush();
      expect(bob.messageIds()).toEqual(sent.map((m) => m.id));

      for (const m of sent) {
        await h.engine.acknowledgeDelivered(m.id, "bob");
      }
      h.registry.unregister("bob", bob);

      const again = h.connect("bob");
      await h.engine.flush();
      expect(again.received).toEqual([]);
    });

    it("bounds the backlog by age", async () => {
      await h.engine.submit(DM, "alice", text("stale"));
      h.clock.now += 61_000;
      const fresh = await h.engine.submit(DM, "alice", text("fresh"));

      const bob = h.connect("bob");
      await h.engine.flush();
      expect(bob.messageIds()).toEqual([fresh.id]);
    });

    it("bounds the backlog by depth, keeping the newest", async () => {
      const limited = buildEngine({ backlogLimit: 2 });
      await limited.engine.submit(DM, "alice", text("one"));
      const two = await limited.engine.submit(DM, "alice", text("two"));
      const three = await limited.engine.submit(DM, "alice", text("three"));

      const bob = limited.connect("bob");
      await limited.engine.flush();
      expect(bob.messageIds()).toEqual([two.id, three.id]);
      limited.close();
    });

    it("cancels a replay when the connection goes away first", async () => {
      await h.engine.submit(DM, "alice", text("one"));
      const bob = new FakeConnection("bob");

      h.registry.register("bob", bob);
      h.registry.unregister("bob", bob);
      await h.engine.flush();

      expect(bob.received).toEqual([]);
      expect(h.engine.stats().outboxes).toBe(0);
    });

    it("does not push a backlog message twice when a live send races the replay", async () => {
      const first = await h.engine.submit(DM, "alice", text("one"));
      const bob = h.connect("bob");
      const second = await h.engine.submit(DM, "alice", text("two"));
      await h.engine.flush();

      expect(bob.messageIds()).toEqual([first.id, second.id]);
    });
  });

  // ----- cache coherence -----

  it("keeps an acknowledgement made during a cold cache fill", async () => {
    const slow = new SlowFillStore(":memory:");
    const run = buildEngine({ store: slow });
    const m1 = await run.engine.submit(DM, "alice", text("one"));

    const filling = run.cache.get(DM);
    await slow.readDone;
    await run.engine.acknowledgeDelivered(m1.id, "bob");
    await filling;

    const [cached] = await run.cache.get(DM);
    expect(deliveryOf(cached, "bob")?.status).toBe("delivered");
    expect(deliveryOf(cached, "bob")).toEqual(deliveryOf(await run.store.getMessage(m1.id), "bob"));
    run.close();
  });

  it("keeps cached status identical to the store after transitions", async () => {
    const m1 = await h.engine.submit(DM, "alice", text("one"));
    const m2 = await h.engine.submit(DM, "alice", text("two"));
    await h.engine.submit(DM, "alice", text("three"));
    await h.cache.warm(DM);

    await h.engine.acknowledgeDelivered(m1.id, "bob");
    await h.engine.acknowledgeRead(m2.id, "bob");

    const cached = await h.cache.get(DM);
    const fromStore = (await h.pagination.page(DM, { bypassCache: true })).messages.reverse();
    expect(cached).toEqual(fromStore);
    expect(cached.map((m) => deliveryOf(m, "bob")?.status)).toEqual(["delivered", "read", "sent"]);
  });
});
