import fc from "fast-check";
import { describe, expect, it } from "vitest";
import { arbPermissions } from "./__tests__/arbitraries.js";
import { parseCapabilities, REQUIRES_CLIENT_CAPABILITY, serializeCapabilities } from "./capabilities.js";
import {
  messageLikeWithType,
  roomMessageWithMsgtype,
  stateWithType,
  stateWithTypeAndStateKey,
} from "./event-filter.js";

describe("serializeCapabilities", () => {
  it("writes read filters, then send filters, then requires_client", () => {
    expect(
      serializeCapabilities({
        read: [stateWithType("m.room.topic"), roomMessageWithMsgtype("m.text")],
        send: [messageLikeWithType("m.reaction"), stateWithTypeAndStateKey("m.room.member", "@a:b")],
        requiresClient: true,
      }),
    ).toEqual([
      "org.matrix.msc2762.receive.state_event:m.room.topic",
      "org.matrix.msc2762.receive.event:m.room.message#m.text",
      "org.matrix.msc2762.send.event:m.reaction",
      "org.matrix.msc2762.send.state_event:m.room.member#@a:b",
      "io.element.requires_client",
    ]);
  });
});

describe("parseCapabilities", () => {
  it("drops capabilities it does not understand", () => {
    expect(
      parseCapabilities([
        "m.always_on_screen",
        "org.matrix.msc2762.receive.state_event:m.room.topic",
        "org.matrix.msc2762.timeline:*",
        REQUIRES_CLIENT_CAPABILITY,
      ]),
    ).toEqual({ read: [stateWithType("m.room.topic")], send: [], requiresClient: true });
  });

  it("only splits msgtype off m.room.message", () => {
    expect(parseCapabilities(["org.matrix.msc2762.send.event:org.example#x"])).toEqual({
      read: [],
      send: [messageLikeWithType("org.example#x")],
      requiresClient: false,
    });
  });

  it("splits the state key at the first #", () => {
    expect(parseCapabilities(["org.matrix.msc2762.receive.state_event:m.room.member#@a:b#c"]).read).toEqual([
      stateWithTypeAndStateKey("m.room.member", "@a:b#c"),
    ]);
  });

  it("ignores a state capability without an event type", () => {
    expect(parseCapabilities(["org.matrix.msc2762.receive.state_event:#key"]).read).toEqual([]);
  });

  it("round-trips any permission set", () => {
    fc.assert(
      fc.property(arbPermissions, (permissions) => {
        expect(parseCapabilities(serializeCapabilities(permissions))).toEqual(permissions);
      }),
    );
  });
});
