import { EmptySelectionError } from "./errors.js";
import type { Logger } from "./log.js";
import { selectRandomElement } from "./selector.js";
import type { CurrentSelection } from "./state.js";

export type UpdaterState = "idle" | "running" | "stopped";

export type UpdaterOptions = {
  files: readonly string[];
  state: CurrentSelection;
  displaySeconds: number;
  logger: Logger;
  random?: () => number;
};

export class Updater {
  status: UpdaterState = "idle";
  readonly intervalMs: number;
  private timer: NodeJS.Timeout | undefined;

  constructor(private options: UpdaterOptions) {
    this.intervalMs = Math.max(1, Math.floor(options.displaySeconds)) * 1000;
  }

  start() {
    if (this.status === "running") return;
    this.status = "running";
    this.tick();
    this.timer = setInterval(() => this.tick(), this.intervalMs);
  }

  stop() {
    clearInterval(this.timer);
    this.timer = undefined;
    this.status = "stopped";
  }

  tick() {
    const { files, state, logger, random } = this.options;
    let image: string;
    try {
      image = selectRandomElement(files, random);
    } catch (err) {
      if (!(err instanceof EmptySelectionError)) throw err;
      logger.error("Error selecting image", err);
      return;
    }
    state.set(image);
    logger.info(`Displaying image: ${image}`);
  }
}
