import fs from "node:fs";
import { createLogger, type Logger, type ResolvedConfig } from "@skillforge/core";
import {
  buildSkill,
  createBuildJob,
  createDeployJob,
  deploySkill,
  type BuildJob,
  type BuildResult,
  type DeployJob,
  type DeployResult
} from "@skillforge/runner";
import { update } from "./machine.js";
import type { WizardEffect, WizardEnv, WizardEvent, WizardState } from "./state.js";

export type WizardTasks = {
  build(job: BuildJob): Promise<BuildResult>;
  deploy(job: DeployJob): Promise<DeployResult>;
};

export type WizardControllerOptions = {
  config: ResolvedConfig;
  initialState: WizardState;
  tasks?: WizardTasks;
  env?: WizardEnv;
  log?: Logger;
  /** Called with the new state after each batch of events. */
  onChange?: (state: WizardState) => void;
  onQuit?: () => void;
};

export const fsWizardEnv: WizardEnv = {
  artifactExists: (p) => {
    try {
      return fs.statSync(p).isFile();
    } catch {
      return false;
    }
  }
};

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Owns the wizard state and its single inbound event queue. Events are
 * applied one at a time; background work started by an effect reports back
 * through the same queue.
 */
export class WizardController {
  private current: WizardState;
  private readonly queue: WizardEvent[] = [];
  private draining = false;
  private stopped = false;
  private readonly tasks: WizardTasks;
  private readonly env: WizardEnv;
  private readonly log: Logger;

  constructor(private readonly options: WizardControllerOptions) {
    this.current = options.initialState;
    this.log = options.log ?? createLogger("wizard");
    this.env = options.env ?? fsWizardEnv;
    this.tasks = options.tasks ?? {
      build: (job) => buildSkill(job, this.log.child("build")),
      deploy: (job) => deploySkill(job, { log: this.log.child("deploy") })
    };
  }

  get state(): WizardState {
    return this.current;
  }

  get isStopped(): boolean {
    return this.stopped;
  }

  dispatch(event: WizardEvent): void {
    if (this.stopped) return;
    this.queue.push(event);
    if (this.draining) return;

    this.draining = true;
    const before = this.current;
    try {
      let next: WizardEvent | undefined;
      while (!this.stopped && (next = this.queue.shift()) !== undefined) {
        const { state, effects } = update(this.current, next, this.env);
        if (state.screen.mode !== this.current.screen.mode) {
          this.log.debug(`${this.current.screen.mode} -> ${state.screen.mode}`);
        }
        this.current = state;
        for (const effect of effects) this.run(effect);
      }
    } finally {
      this.draining = false;
    }

    if (this.current !== before && !this.stopped) {
      this.options.onChange?.(this.current);
    }
  }

  private run(effect: WizardEffect): void {
    const { config } = this.options;
    switch (effect.type) {
      case "quit":
        this.stopped = true;
        this.queue.length = 0;
        this.options.onQuit?.();
        return;
      case "build": {
        const job = createBuildJob(effect.manifest, config);
        void this.tasks.build(job).then(
          (result) => this.dispatch({ type: "build-complete", result }),
          (err: unknown) =>
            this.dispatch({ type: "build-complete", result: { ok: false, error: errorMessage(err), output: "" } })
        );
        return;
      }
      case "deploy": {
        const job: DeployJob = {
          ...createDeployJob(effect.manifest, config, effect.deployPath, effect.values),
          stagedBinary: effect.stagedBinary
        };
        void this.tasks.deploy(job).then(
          (result) => this.dispatch({ type: "deploy-complete", result }),
          (err: unknown) =>
            this.dispatch({ type: "deploy-complete", result: { ok: false, error: errorMessage(err), written: [] } })
        );
        return;
      }
    }
  }
}
