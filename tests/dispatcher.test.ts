import { describe, expect, it, vi } from "vitest";
import { NOTICES } from "../src/constants";
import { RateLimiter } from "../src/rate-limiter";
import { ADMIN, STRANGER, USER, FakeTransport, createHarness, fakeBackend, voicePayload } from "./helpers";

vi.mock("../src/logger");

describe("RequestDispatcher", () => {
  describe("authorization guard", () => {
    it("rejects unauthorized users without calling the backend", async () => {
      const { dispatcher, backend } = createHarness();
      const transport = new FakeTransport();

      await expect(dispatcher.handleText(transport, STRANGER, "hi")).resolves.toBe("rejected");

      expect(transport.events).toEqual([{ type: "send", id: 1, text: NOTICES.notAuthorized }]);
      expect(backend.generateText).not.toHaveBeenCalled();
    });

    it("rejects unauthorized voice and image requests too", async () => {
      const { dispatcher, backend } = createHarness();
      const transport = new FakeTransport();

      await expect(dispatcher.handleVoice(transport, STRANGER, voicePayload())).resolves.toBe("rejected");
      await expect(dispatcher.handleImage(transport, STRANGER, "a cat")).resolves.toBe("rejected");

      expect(transport.visibleTexts()).toEqual([NOTICES.notAuthorized, NOTICES.notAuthorized]);
      expect(backend.generateWithAudio).not.toHaveBeenCalled();
      expect(backend.generateImage).not.toHaveBeenCalled();
    });

    it("lets the admin through without an explicit grant", async () => {
      const { dispatcher } = createHarness();
      const transport = new FakeTransport();

      await expect(dispatcher.handleText(transport, ADMIN, "ping")).resolves.toBe("delivered");
      expect(transport.visibleTexts()).toEqual(["echo: ping"]);
    });
  });

  describe("text requests", () => {
    it("replaces the processing placeholder with the reply", async () => {
      const { dispatcher, backend } = createHarness();
      const transport = new FakeTransport();

      await expect(dispatcher.handleText(transport, USER, "hi")).resolves.toBe("delivered");

      expect(backend.generateText).toHaveBeenCalledWith("hi");
      expect(transport.events).toEqual([
        { type: "send", id: 1, text: NOTICES.processing },
        { type: "edit", id: 1, text: "echo: hi" },
      ]);
    });

    it("delivers long replies as ordered segments", async () => {
      const body = "a".repeat(3999) + "b".repeat(4000) + "c".repeat(1001);
      const { dispatcher } = createHarness({ backend: fakeBackend({ generateText: vi.fn(async () => body) }) });
      const transport = new FakeTransport();

      await dispatcher.handleText(transport, USER, "long please");

      expect(transport.events).toEqual([
        { type: "send", id: 1, text: NOTICES.processing },
        { type: "edit", id: 1, text: body.slice(0, 4000) },
        { type: "send", id: 2, text: body.slice(4000, 8000) },
        { type: "send", id: 3, text: body.slice(8000) },
      ]);
      expect(transport.visibleTexts().join("")).toBe(body);
    });

    it("strips markup tags from the reply", async () => {
      const { dispatcher } = createHarness({
        backend: fakeBackend({ generateText: vi.fn(async () => "<b>Bold</b> answer") }),
      });
      const transport = new FakeTransport();

      await dispatcher.handleText(transport, USER, "hi");

      expect(transport.visibleTexts()).toEqual(["Bold answer"]);
    });

    it("shows the rate-limit notice for 429 and quota failures", async () => {
      for (const message of ["429 Too Many Requests", "Quota exceeded for model"]) {
        const { dispatcher } = createHarness({
          backend: fakeBackend({ generateText: vi.fn(async () => Promise.reject(new Error(message))) }),
        });
        const transport = new FakeTransport();

        await expect(dispatcher.handleText(transport, USER, "hi")).resolves.toBe("failed");
        expect(transport.events).toEqual([
          { type: "send", id: 1, text: NOTICES.processing },
          { type: "edit", id: 1, text: NOTICES.rateLimited },
        ]);
      }
    });

    it("shows the generic notice for other failures", async () => {
      const { dispatcher } = createHarness({
        backend: fakeBackend({ generateText: vi.fn(async () => Promise.reject(new Error("internal error"))) }),
      });
      const transport = new FakeTransport();

      await expect(dispatcher.handleText(transport, USER, "hi")).resolves.toBe("failed");
      expect(transport.visibleTexts()).toEqual([NOTICES.backendFailure]);
    });

    it("deletes the placeholder and sends fresh when editing fails", async () => {
      const { dispatcher } = createHarness();
      const transport = new FakeTransport();
      transport.failEdits = true;

      await expect(dispatcher.handleText(transport, USER, "hi")).resolves.toBe("delivered");

      expect(transport.events).toEqual([
        { type: "send", id: 1, text: NOTICES.processing },
        { type: "delete", id: 1 },
        { type: "send", id: 2, text: "echo: hi" },
      ]);
    });

    it("follows a partly delivered reply with a notice", async () => {
      const body = "x".repeat(9000);
      const { dispatcher } = createHarness({ backend: fakeBackend({ generateText: vi.fn(async () => body) }) });
      const transport = new FakeTransport();
      // Call 1 is the placeholder, call 2 the second segment
      transport.failOnSend = 2;

      await expect(dispatcher.handleText(transport, USER, "long please")).resolves.toBe("failed");

      expect(transport.events).toEqual([
        { type: "send", id: 1, text: NOTICES.processing },
        { type: "edit", id: 1, text: body.slice(0, 4000) },
        { type: "send", id: 2, text: NOTICES.deliveryFailed },
      ]);
    });

    it("puts the notice where the placeholder was when the first segment fails", async () => {
      const { dispatcher } = createHarness();
      const transport = new FakeTransport();
      transport.failEdits = true;
      transport.failOnSend = 2;

      await expect(dispatcher.handleText(transport, USER, "hi")).resolves.toBe("failed");

      expect(transport.visibleTexts()).toEqual([NOTICES.deliveryFailed]);
    });

    it("sends the reply directly when the placeholder could not be sent", async () => {
      const { dispatcher } = createHarness();
      const transport = new FakeTransport();
      vi.spyOn(transport, "sendText").mockRejectedValueOnce(new Error("network down"));

      await expect(dispatcher.handleText(transport, USER, "hi")).resolves.toBe("delivered");

      expect(transport.events).toEqual([{ type: "send", id: 1, text: "echo: hi" }]);
    });

    it("waits on the shared rate limiter before each backend call", async () => {
      let now = 0;
      const sleeps: number[] = [];
      const limiter = new RateLimiter({
        minIntervalMs: 4000,
        now: () => now,
        sleep: async (ms) => {
          sleeps.push(ms);
          now += ms;
        },
      });
      const calledAt: number[] = [];
      const backend = fakeBackend({
        generateText: vi.fn(async (prompt: string) => {
          calledAt.push(now);
          return prompt;
        }),
      });
      const { dispatcher } = createHarness({ limiter, backend });

      await Promise.all([
        dispatcher.handleText(new FakeTransport(), USER, "one"),
        dispatcher.handleText(new FakeTransport(), ADMIN, "two"),
      ]);

      expect(sleeps).toEqual([4000]);
      expect(calledAt).toEqual([0, 4000]);
    });
  });

  describe("voice requests", () => {
    it("sends the audio with the voice prompt and shows transcription and reply", async () => {
      const { dispatcher, backend } = createHarness();
      const transport = new FakeTransport();
      const audio = new Uint8Array([5, 6, 7]);

      await expect(dispatcher.handleVoice(transport, USER, voicePayload(audio))).resolves.toBe("delivered");

      expect(backend.generateWithAudio).toHaveBeenCalledWith("transcribe then answer", audio, "audio/ogg");
      expect(transport.visibleTexts()).toEqual(["🎙️ hello.\n\n💬 hi there"]);
    });

    it("refuses voice notes above the size cap", async () => {
      const { dispatcher, backend } = createHarness();
      const transport = new FakeTransport();

      await expect(dispatcher.handleVoice(transport, USER, voicePayload(undefined, 5000))).resolves.toBe("invalid");

      expect(transport.events).toEqual([{ type: "send", id: 1, text: NOTICES.voiceTooLarge }]);
      expect(backend.generateWithAudio).not.toHaveBeenCalled();
    });

    it("reports a failed download as a generic failure", async () => {
      const { dispatcher, backend } = createHarness();
      const transport = new FakeTransport();

      const outcome = await dispatcher.handleVoice(transport, USER, {
        mimeType: "audio/ogg",
        withAudio: async () => {
          throw new Error("Download failed with status 429");
        },
      });

      expect(outcome).toBe("failed");
      expect(transport.visibleTexts()).toEqual([NOTICES.backendFailure]);
      expect(backend.generateWithAudio).not.toHaveBeenCalled();
    });

    it("classifies backend errors from the audio call", async () => {
      const { dispatcher } = createHarness({
        backend: fakeBackend({ generateWithAudio: vi.fn(async () => Promise.reject(new Error("quota exhausted"))) }),
      });
      const transport = new FakeTransport();

      await dispatcher.handleVoice(transport, USER, voicePayload());

      expect(transport.visibleTexts()).toEqual([NOTICES.rateLimited]);
    });
  });

  describe("image requests", () => {
    it("sends the generated image and removes the placeholder", async () => {
      const { dispatcher, backend } = createHarness();
      const transport = new FakeTransport();

      await expect(dispatcher.handleImage(transport, USER, "  a red bicycle  ")).resolves.toBe("delivered");

      expect(backend.generateImage).toHaveBeenCalledWith("a red bicycle");
      expect(transport.events).toEqual([
        { type: "send", id: 1, text: NOTICES.generatingImage },
        { type: "photo", bytes: 4, caption: "a red bicycle" },
        { type: "delete", id: 1 },
      ]);
    });

    it("shortens long captions without splitting an emoji", async () => {
      const { dispatcher } = createHarness();
      const transport = new FakeTransport();
      const description = "a".repeat(1023) + "😀 and more";

      await dispatcher.handleImage(transport, USER, description);

      expect(transport.events[1]).toEqual({ type: "photo", bytes: 4, caption: "a".repeat(1023) });
    });

    it("asks for a description when none is given", async () => {
      const { dispatcher, backend } = createHarness();
      const transport = new FakeTransport();

      await expect(dispatcher.handleImage(transport, USER, "   ")).resolves.toBe("invalid");

      expect(transport.visibleTexts()).toEqual([NOTICES.imageUsage]);
      expect(backend.generateImage).not.toHaveBeenCalled();
    });

    it("tells the user when the model returned no image", async () => {
      const { dispatcher } = createHarness({
        backend: fakeBackend({ generateImage: vi.fn(async () => null) }),
      });
      const transport = new FakeTransport();

      await expect(dispatcher.handleImage(transport, USER, "a cat")).resolves.toBe("failed");
      expect(transport.visibleTexts()).toEqual([NOTICES.imageUnavailable]);
    });

    it("shows the failure notice when the photo cannot be sent", async () => {
      const { dispatcher } = createHarness();
      const transport = new FakeTransport();
      transport.failPhotos = true;

      await expect(dispatcher.handleImage(transport, USER, "a cat")).resolves.toBe("failed");
      expect(transport.visibleTexts()).toEqual([NOTICES.backendFailure]);
    });

    it("classifies image backend failures", async () => {
      const { dispatcher } = createHarness({
        backend: fakeBackend({ generateImage: vi.fn(async () => Promise.reject(new Error("HTTP 429"))) }),
      });
      const transport = new FakeTransport();

      await dispatcher.handleImage(transport, USER, "a cat");

      expect(transport.visibleTexts()).toEqual([NOTICES.rateLimited]);
    });
  });

  describe("admin commands", () => {
    it("authorizes a new user", async () => {
      const { dispatcher, store } = createHarness();
      const transport = new FakeTransport();

      await dispatcher.authorizeUser(transport, ADMIN, "4242");
      await dispatcher.authorizeUser(transport, ADMIN, "4242");

      expect(store.isAuthorized(4242)).toBe(true);
      expect(transport.visibleTexts()).toEqual([
        "✅ User 4242 is now authorized.",
        "User 4242 is already authorized.",
      ]);
    });

    it("rejects malformed targets", async () => {
      const { dispatcher, store } = createHarness();
      const transport = new FakeTransport();

      for (const args of ["", "abc", "12 34", "0", "-7"]) {
        await dispatcher.authorizeUser(transport, ADMIN, args);
      }
      await dispatcher.revokeUser(transport, ADMIN, "two");

      expect(transport.visibleTexts()).toEqual([
        "Usage: /auth <user_id>",
        "Usage: /auth <user_id>",
        "Usage: /auth <user_id>",
        "Usage: /auth <user_id>",
        "Usage: /auth <user_id>",
        "Usage: /revoke <user_id>",
      ]);
      expect(store.list()).toEqual([ADMIN, USER]);
    });

    it("refuses admin commands from non-admins", async () => {
      const { dispatcher, store } = createHarness();
      const transport = new FakeTransport();

      await dispatcher.authorizeUser(transport, USER, "4242");
      await dispatcher.revokeUser(transport, USER, String(ADMIN));
      await dispatcher.listUsers(transport, STRANGER);

      expect(transport.visibleTexts()).toEqual([NOTICES.adminOnly, NOTICES.adminOnly, NOTICES.adminOnly]);
      expect(store.isAuthorized(4242)).toBe(false);
    });

    it("revokes users but never the admin", async () => {
      const { dispatcher, store } = createHarness();
      const transport = new FakeTransport();

      await dispatcher.revokeUser(transport, ADMIN, String(USER));
      await dispatcher.revokeUser(transport, ADMIN, String(ADMIN));
      await dispatcher.revokeUser(transport, ADMIN, "777");

      expect(transport.visibleTexts()).toEqual([
        "✅ Access revoked for user 2002.",
        "⚠️ The admin cannot be revoked.",
        "User 777 was not authorized.",
      ]);
      expect(store.isAuthorized(USER)).toBe(false);
      expect(store.isAuthorized(ADMIN)).toBe(true);
    });

    it("reports storage failures", async () => {
      const { dispatcher, store } = createHarness();
      const transport = new FakeTransport();
      vi.spyOn(store, "authorize").mockImplementation(() => {
        throw new Error("EACCES: permission denied");
      });

      await dispatcher.authorizeUser(transport, ADMIN, "4242");

      expect(transport.visibleTexts()).toEqual([NOTICES.storageFailure]);
    });

    it("lists authorized users with the admin marked", async () => {
      const { dispatcher } = createHarness();
      const transport = new FakeTransport();

      await dispatcher.listUsers(transport, ADMIN);

      expect(transport.visibleTexts()).toEqual(["Authorized users (2):\n• 1001 (admin)\n• 2002"]);
    });
  });

  describe("whoami", () => {
    it("reports the caller's id and access level", async () => {
      const { dispatcher } = createHarness();
      const transport = new FakeTransport();

      await dispatcher.whoami(transport, STRANGER);
      await dispatcher.whoami(transport, USER);
      await dispatcher.whoami(transport, ADMIN);

      expect(transport.visibleTexts()).toEqual([
        "👤 Your ID: 3003\nStatus: ⛔ not authorized",
        "👤 Your ID: 2002\nStatus: ✅ authorized",
        "👤 Your ID: 1001\nStatus: 👑 admin",
      ]);
    });
  });
});
