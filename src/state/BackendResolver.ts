import type { RunContext } from "../context";
import { logger } from "../logger";
import { writeBackendDescriptor } from "./BackendDescriptor";
import { isUsableRecord, type BackendStore } from "./BackendStore";
import type { Bootstrapper } from "./Bootstrapper";

export enum ResolutionState {
  Unresolved = "unresolved",
  Checking = "checking",
  Found = "found",
  Provisioning = "provisioning",
  Resolved = "resolved",
}

const TRANSITIONS: Record<ResolutionState, ResolutionState[]> = {
  [ResolutionState.Unresolved]: [ResolutionState.Checking],
  [ResolutionState.Checking]: [
    ResolutionState.Found,
    ResolutionState.Provisioning,
  ],
  [ResolutionState.Found]: [ResolutionState.Resolved],
  [ResolutionState.Provisioning]: [ResolutionState.Resolved],
  [ResolutionState.Resolved]: [],
};

export function canTransition(from: ResolutionState, to: ResolutionState) {
  return TRANSITIONS[from].includes(to);
}

export type Resolution = {
  descriptor: string;
  source: "store" | "bootstrap";
};

/**
 * Makes sure the target directory has a backend descriptor: reuses the
 * published record when there is one, bootstraps otherwise. One resolver
 * handles a single resolution.
 */
export class BackendResolver {
  private current = ResolutionState.Unresolved;

  constructor(
    private readonly store: BackendStore,
    private readonly bootstrapper: Bootstrapper
  ) {}

  get state() {
    return this.current;
  }

  async resolve(context: RunContext): Promise<Resolution> {
    this.transition(ResolutionState.Checking);
    const lookup = await this.store.get(context.parameterName);
    if (lookup.status === "error") {
      logger.warn(`${lookup.error.message}; treating backend as absent`);
    }

    if (isUsableRecord(lookup)) {
      this.transition(ResolutionState.Found);
      logger.info(
        `Found backend configuration in SSM ${context.parameterName}`
      );
      writeBackendDescriptor(context.targetDir, lookup.value);
      this.transition(ResolutionState.Resolved);
      return { descriptor: lookup.value, source: "store" };
    }

    this.transition(ResolutionState.Provisioning);
    logger.info(
      `Backend SSM parameter ${context.parameterName} not found or empty. Running bootstrap to create backend and SSM entry.`
    );
    // A record that exists but is unusable gets replaced; otherwise only
    // create, so a concurrent bootstrap's record is never overwritten
    const { descriptor } = await this.bootstrapper.run(
      context,
      lookup.status === "found" ? "upsert" : "create"
    );
    this.transition(ResolutionState.Resolved);
    return { descriptor, source: "bootstrap" };
  }

  private transition(next: ResolutionState) {
    if (!canTransition(this.current, next)) {
      throw new Error(
        `Invalid backend resolution transition: ${this.current} -> ${next}`
      );
    }
    logger.debug(`Backend resolution: ${this.current} -> ${next}`);
    this.current = next;
  }
}
