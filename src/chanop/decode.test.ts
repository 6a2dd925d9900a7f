import { describe, expect, it } from "vitest";
import { decodeIrcLine, parseIrcLine } from "./decode.js";

describe("parseIrcLine", () => {
  it("splits tags, prefix, command and params", () => {
    expect(parseIrcLine("@time=now;bot :alice!a@h PRIVMSG #ops :hello there\r\n")).toEqual({
      tags: { time: "now", bot: "" },
      prefix: "alice!a@h",
      command: "PRIVMSG",
      params: ["#ops", "hello there"],
      trailing: true,
    });
  });

  it("rejects empty lines", () => {
    expect(parseIrcLine("")).toBeUndefined();
    expect(parseIrcLine(":prefix-only")).toBeUndefined();
  });
});

describe("decodeIrcLine", () => {
  it("decodes membership changes", () => {
    expect(decodeIrcLine("libera", ":alice!a@h JOIN #ops")).toEqual({
      kind: "join",
      server: "libera",
      channel: "#ops",
      hostmask: "alice!a@h",
    });
    expect(decodeIrcLine("libera", ":alice!a@h JOIN :#ops")).toMatchObject({ channel: "#ops" });
    expect(decodeIrcLine("libera", ":alice!a@h PART #ops :bye")).toEqual({
      kind: "part",
      server: "libera",
      channel: "#ops",
      hostmask: "alice!a@h",
    });
    expect(decodeIrcLine("libera", ":alice!a@h QUIT :Quit: bye")).toEqual({
      kind: "quit",
      server: "libera",
      hostmask: "alice!a@h",
    });
    expect(decodeIrcLine("libera", ":alice!a@h NICK :alicia")).toEqual({
      kind: "nick",
      server: "libera",
      hostmask: "alice!a@h",
      newNick: "alicia",
    });
  });

  it("decodes channel mode changes only", () => {
    expect(decodeIrcLine("libera", ":op!o@h MODE #ops +bo *!*@bad me")).toEqual({
      kind: "mode",
      server: "libera",
      channel: "#ops",
      actor: "op!o@h",
      modes: "+bo",
      args: ["*!*@bad", "me"],
    });
    expect(decodeIrcLine("libera", ":me MODE me :+i")).toBeUndefined();
  });

  it("decodes ban and quiet list replies", () => {
    expect(
      decodeIrcLine("libera", ":irc.test 367 me #ops *!*@bad op!o@h 1700000000"),
    ).toEqual({
      kind: "maskListEntry",
      server: "libera",
      channel: "#ops",
      mask: "*!*@bad",
      operator: "op!o@h",
      date: 1_700_000_000,
    });
    expect(decodeIrcLine("libera", ":irc.test 728 me #ops q *!*@muted op 1700000001")).toEqual({
      kind: "maskListEntry",
      server: "libera",
      channel: "#ops",
      mask: "*!*@muted",
      operator: "op",
      date: 1_700_000_001,
    });
    expect(decodeIrcLine("libera", ":irc.test 367 me #ops *!*@bare")).toEqual({
      kind: "maskListEntry",
      server: "libera",
      channel: "#ops",
      mask: "*!*@bare",
      operator: undefined,
      date: undefined,
    });
    expect(decodeIrcLine("libera", ":irc.test 368 me #ops :End of Channel Ban List")).toEqual({
      kind: "maskListEnd",
      server: "libera",
      channel: "#ops",
    });
    expect(decodeIrcLine("libera", ":irc.test 729 me #ops q :End of list")).toEqual({
      kind: "maskListEnd",
      server: "libera",
      channel: "#ops",
    });
  });

  it("decodes ISUPPORT and welcome", () => {
    expect(
      decodeIrcLine(
        "libera",
        ":irc.test 005 me CHANMODES=beIq,k,l,imnpst MODES=4 :are supported by this server",
      ),
    ).toEqual({
      kind: "isupport",
      server: "libera",
      tokens: ["CHANMODES=beIq,k,l,imnpst", "MODES=4"],
    });
    expect(decodeIrcLine("libera", ":irc.test 001 me :Welcome")).toEqual({
      kind: "connected",
      server: "libera",
    });
  });

  it("ignores everything else", () => {
    expect(decodeIrcLine("libera", "PING :irc.test")).toBeUndefined();
    expect(decodeIrcLine("libera", ":alice!a@h PRIVMSG #ops :hi")).toBeUndefined();
  });
});
