import fsp from "node:fs/promises";
import os from "node:os";
import { join } from "node:path";
import { LocalTransport } from "../local-transport.js";
import { housekeepingSteps, parseOwner, RemoteHousekeeping } from "../post-process.js";
import { FakeTransport, writeFile } from "./util.js";

describe("remote housekeeping", () => {
  test("planned commands", () => {
    const steps = housekeepingSteps("/srv/media", {
      owner: "www-data",
      rescanCommand: "  occ files:scan --all ",
    });
    expect(steps).toEqual([
      {
        name: "file permissions",
        command: "find '/srv/media' -type f -exec chmod 644 {} +",
      },
      {
        name: "directory permissions",
        command: "find '/srv/media' -type d -exec chmod 755 {} +",
      },
      { name: "ownership", command: "chown -R 'www-data:www-data' '/srv/media'" },
      { name: "rescan", command: "occ files:scan --all" },
    ]);
  });

  test("owner with an explicit group", () => {
    expect(parseOwner("media:users")).toEqual({ user: "media", group: "users" });
    expect(() => parseOwner(":users")).toThrow("invalid owner ':users'");
  });

  test("rejects modes that are not octal", () => {
    expect(() => housekeepingSteps("/x", { fileMode: "rw-r--r--" })).toThrow(
      "invalid mode 'rw-r--r--'",
    );
  });

  test("simulated run only logs", async () => {
    const t = new FakeTransport();
    const hook = new RemoteHousekeeping(t, { owner: "www-data" });
    expect(await hook.run("/srv/media", true)).toBe("ok");
    expect(t.commands).toEqual([]);
  });

  test("ok, partial and fail outcomes", async () => {
    const t = new FakeTransport();
    const hook = new RemoteHousekeeping(t, { owner: "www-data" });
    expect(await hook.run("/srv/media", false)).toBe("ok");
    expect(t.commands).toHaveLength(3);

    t.runImpl = (cmd) =>
      cmd.startsWith("chown")
        ? { exitStatus: 1, stdout: "", stderr: "operation not permitted" }
        : { exitStatus: 0, stdout: "", stderr: "" };
    expect(await hook.run("/srv/media", false)).toBe("partial");

    t.runImpl = () => ({ exitStatus: 2, stdout: "", stderr: "nope" });
    expect(await hook.run("/srv/media", false)).toBe("fail");
  });

  test("normalizes modes on a real directory tree", async () => {
    const tmp = await fsp.mkdtemp(join(os.tmpdir(), "mediasync-post-"));
    try {
      const f = await writeFile(tmp, "album/a.jpg", "x");
      await fsp.chmod(f, 0o600);
      await fsp.chmod(join(tmp, "album"), 0o700);
      const t = new LocalTransport();
      await t.connect();
      expect(await new RemoteHousekeeping(t).run(tmp, false)).toBe("ok");
      await t.disconnect();
      expect((await fsp.stat(f)).mode & 0o777).toBe(0o644);
      expect((await fsp.stat(join(tmp, "album"))).mode & 0o777).toBe(0o755);
    } finally {
      await fsp.rm(tmp, { recursive: true, force: true });
    }
  });
});
