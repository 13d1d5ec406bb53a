import { createPresenceRegistry, type PresenceConnection } from "../backend/src/realtime/presenceRegistry";

function fakeConnection(id: string, userId: number): PresenceConnection {
  return {
    id,
    userId,
    async send(): Promise<void> {},
    close(): void {}
  };
}

describe("presenceRegistry", () => {
  it("Given an empty registry When a user registers Then lookup returns the connection and snapshot lists the user", () => {
    const presence = createPresenceRegistry();
    const conn = fakeConnection("c-1", 7);

    expect(presence.register(7, conn)).toBeUndefined();
    expect(presence.lookup(7)).toBe(conn);
    expect(Array.from(presence.snapshot())).toEqual([7]);
    expect(presence.size()).toBe(1);
  });

  it("Given a registered user When the same user registers again Then the newer connection wins and the previous one is returned", () => {
    const presence = createPresenceRegistry();
    const first = fakeConnection("c-1", 7);
    const second = fakeConnection("c-2", 7);
    let firstClosed = false;
    const watched: PresenceConnection = { ...first, close: () => (firstClosed = true) };

    presence.register(7, watched);
    const replaced = presence.register(7, second);

    expect(replaced).toBe(watched);
    expect(presence.lookup(7)).toBe(second);
    expect(firstClosed).toBe(false);
    expect(presence.size()).toBe(1);
  });

  it("Given a superseded connection When it unregisters itself Then the newer binding survives", () => {
    const presence = createPresenceRegistry();
    const stale = fakeConnection("c-1", 7);
    const fresh = fakeConnection("c-2", 7);
    presence.register(7, stale);
    presence.register(7, fresh);

    expect(presence.unregister(7, stale)).toBe(false);
    expect(presence.lookup(7)).toBe(fresh);

    expect(presence.unregister(7, fresh)).toBe(true);
    expect(presence.lookup(7)).toBeUndefined();
  });

  it("Given an unknown user When unregister is called twice Then both calls are no-ops", () => {
    const presence = createPresenceRegistry();
    expect(presence.unregister(99)).toBe(false);
    expect(presence.unregister(99)).toBe(false);
    expect(presence.size()).toBe(0);
  });

  it("Given a snapshot When the registry changes afterwards Then the snapshot is unaffected", () => {
    const presence = createPresenceRegistry();
    presence.register(1, fakeConnection("c-1", 1));
    const snapshot = presence.snapshot();
    presence.register(2, fakeConnection("c-2", 2));

    expect(Array.from(snapshot)).toEqual([1]);
    expect(Array.from(presence.snapshot()).sort()).toEqual([1, 2]);
  });
});
