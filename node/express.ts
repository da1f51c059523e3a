import express, { Request, Response } from "express";
import cors from "cors";
import path from "node:path";
import type { Config } from "./config.js";
import { OutsideImageRootError, errorMessage } from "./errors.js";
import type { Logger } from "./log.js";
import type { CurrentSelection } from "./state.js";
import type { Template } from "./template.js";

export const IMAGES_MOUNT = "/images";

export type AppOptions = {
  config: Pick<Config, "imageDirectory" | "displaySeconds">;
  state: CurrentSelection;
  template: Template;
  logger: Logger;
};

/**
 * Maps an absolute path under `imageRoot` to its URL below the images
 * mount. An empty selection (nothing picked yet) maps to "".
 */
export function toImageUrl(imageRoot: string, selection: string) {
  if (!selection) return "";
  const relative = path.relative(path.resolve(imageRoot), selection);
  if (
    !relative ||
    relative === ".." ||
    relative.startsWith(`..${path.sep}`) ||
    path.isAbsolute(relative) ||
    !path.isAbsolute(selection)
  ) {
    throw new OutsideImageRootError(imageRoot, selection);
  }
  const segments = relative.split(path.sep).map(encodeURIComponent);
  return `${IMAGES_MOUNT}/${segments.join("/")}`;
}

export function createApp({ config, state, template, logger }: AppOptions) {
  const app = express();

  app.use(cors());

  app.get("/", (req: Request, res: Response) => {
    let page: string;
    try {
      const imageUrl = toImageUrl(config.imageDirectory, state.get());
      page = template.render({
        ImageURL: imageUrl,
        DisplaySeconds: config.displaySeconds,
      });
    } catch (err) {
      logger.error("Error rendering template", err);
      res
        .status(500)
        .type("text/plain")
        .send(`Error rendering template: ${errorMessage(err)}`);
      return;
    }
    res.type("text/html").send(page);
  });

  app.get("/current", (req: Request, res: Response) => {
    let imageUrl: string;
    try {
      imageUrl = toImageUrl(config.imageDirectory, state.get());
    } catch (err) {
      logger.error("Error resolving image url", err);
      res.status(500).json({ error: errorMessage(err) });
      return;
    }
    res.json({
      imageUrl,
      displaySeconds: config.displaySeconds,
      changedAt: state.changedAt?.toISOString() ?? null,
    });
  });

  app.use(IMAGES_MOUNT, express.static(config.imageDirectory));

  return app;
}
