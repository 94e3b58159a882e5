// src/post-process.ts
//
// Housekeeping on the destination after files landed: normalize modes, hand
// the tree to the serving user, and poke the application that indexes it.

import { errorMessage, NullLogger, type Logger } from "./logger.js";
import {
  LONG_COMMAND_TIMEOUT_MS,
  shellEscape,
  type RemoteTransport,
} from "./remote.js";

export type PostProcessResult = "ok" | "partial" | "fail";

export interface PostProcessHook {
  run(targetPath: string, simulate: boolean): Promise<PostProcessResult>;
}

export interface HousekeepingOptions {
  fileMode?: string;
  dirMode?: string;
  /** `user` or `user:group`; no chown when unset. */
  owner?: string;
  /** Run verbatim on the destination host, e.g. an app's file index rescan. */
  rescanCommand?: string;
  timeoutMs?: number;
  logger?: Logger;
}

export interface HousekeepingStep {
  name: string;
  command: string;
}

const MODE_RE = /^[0-7]{3,4}$/;

export function parseOwner(owner: string): { user: string; group: string } {
  const [user, group] = owner.split(":", 2);
  if (!user) throw new Error(`invalid owner '${owner}'`);
  return { user, group: group || user };
}

export function housekeepingSteps(
  targetPath: string,
  { fileMode = "644", dirMode = "755", owner, rescanCommand }: HousekeepingOptions = {},
): HousekeepingStep[] {
  for (const mode of [fileMode, dirMode]) {
    if (!MODE_RE.test(mode)) throw new Error(`invalid mode '${mode}'`);
  }
  const root = shellEscape(targetPath);
  const steps: HousekeepingStep[] = [
    {
      name: "file permissions",
      command: `find ${root} -type f -exec chmod ${fileMode} {} +`,
    },
    {
      name: "directory permissions",
      command: `find ${root} -type d -exec chmod ${dirMode} {} +`,
    },
  ];
  if (owner) {
    const { user, group } = parseOwner(owner);
    steps.push({
      name: "ownership",
      command: `chown -R ${shellEscape(`${user}:${group}`)} ${root}`,
    });
  }
  if (rescanCommand?.trim()) {
    steps.push({ name: "rescan", command: rescanCommand.trim() });
  }
  return steps;
}

export class RemoteHousekeeping implements PostProcessHook {
  private readonly logger: Logger;

  constructor(
    private readonly transport: RemoteTransport,
    private readonly opts: HousekeepingOptions = {},
  ) {
    this.logger = (opts.logger ?? new NullLogger()).child("post-process");
  }

  async run(targetPath: string, simulate: boolean): Promise<PostProcessResult> {
    const steps = housekeepingSteps(targetPath, this.opts);
    if (simulate) {
      for (const step of steps) {
        this.logger.info("would run", { step: step.name, command: step.command });
      }
      return "ok";
    }

    let ok = 0;
    for (const step of steps) {
      this.logger.info("running", { step: step.name });
      try {
        const res = await this.transport.run(
          step.command,
          this.opts.timeoutMs ?? LONG_COMMAND_TIMEOUT_MS,
        );
        if (res.exitStatus === 0) {
          ok++;
          const out = res.stdout.trim();
          if (out) this.logger.debug("output", { step: step.name, output: out });
        } else {
          this.logger.error("step failed", {
            step: step.name,
            exitStatus: res.exitStatus,
            stderr: res.stderr.trim(),
          });
        }
      } catch (err) {
        this.logger.error("step failed", { step: step.name, error: errorMessage(err) });
      }
    }
    if (ok === steps.length) return "ok";
    return ok === 0 ? "fail" : "partial";
  }
}
