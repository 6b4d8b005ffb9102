import os from "os";
import { describe, expect, it } from "vitest";
import { currentIdentity, parsePasswdHome } from "../../src/host/context";

describe("currentIdentity", () => {
  it("uses the invoking user's own account outside sudo", () => {
    const info = os.userInfo();

    expect(currentIdentity({})).toEqual({ uid: info.uid, gid: info.gid, home: info.homedir });
  });

  it("resolves the home of the user behind sudo from the passwd database", () => {
    const env = { SUDO_USER: "homelab-tester", SUDO_UID: "1001", SUDO_GID: "1002" };

    expect(currentIdentity(env, (user) => (user === "homelab-tester" ? "/srv/homes/tester" : undefined))).toEqual({
      uid: 1001,
      gid: 1002,
      home: "/srv/homes/tester",
    });
    expect(currentIdentity(env, () => undefined).home).toBe("/home/homelab-tester");
  });
});

describe("parsePasswdHome", () => {
  it("reads the sixth field of a passwd entry", () => {
    expect(parsePasswdHome("tester:x:1001:1002:Test User:/srv/homes/tester:/bin/bash\n")).toBe("/srv/homes/tester");
    expect(parsePasswdHome("root:x:0:0:root:/root:/bin/sh")).toBe("/root");
    expect(parsePasswdHome("")).toBeUndefined();
  });
});
