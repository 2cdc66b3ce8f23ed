import cors from "cors";
import express from "express";
import fs from "fs/promises";
import path from "path";
import {
  BadRequestError,
  NotFoundError,
  asyncRoute,
  errorHandler,
  isMissingFileError,
  notFoundHandler,
} from "./modules/errors.js";
import type { CustomRouteStore } from "./modules/custom-routes.js";
import {
  listExampleSites,
  resolveExampleSite,
  staticAssetType,
} from "./modules/example-sites.js";
import { logDebug, logInfo } from "./modules/logger.js";
import {
  buildSelfRedirect,
  readUrlParam,
  type PageFetcher,
} from "./modules/navigation.js";
import type { RenderService } from "./modules/page-renderer.js";
import { isSafeImageFilename } from "./modules/screenshot.js";
import {
  renderIndexPage,
  renderXrlEmulator,
  type EndpointRow,
} from "./modules/templates.js";
import { buildXrlDocument } from "./modules/xrl-document.js";

export interface XrlConnectorOptions {
  examplesDir: string;
  imagesDir: string;
  routes: CustomRouteStore;
  renderer: RenderService;
  fetchPage: PageFetcher;
  /** Base URL the browser and clients use to reach this server; derived from each request when unset */
  publicBaseUrl?: string;
}

export interface RoutesListing {
  example_sites: Array<{ name: string; url: string }>;
  custom_sites: Array<{ name: string; url: string }>;
}

/**
 * Registers the XRL demo routes on an Express app.
 */
export class XrlConnector {
  private readonly app: express.Application;
  private readonly options: XrlConnectorOptions;

  constructor(app: express.Application, options: XrlConnectorOptions) {
    this.app = app;
    this.options = options;

    this.app.get("/", asyncRoute((req, res) => this.index(req, res)));

    this.app.get("/favicon.ico", (req, res, next) => {
      this.sendFile(
        res,
        next,
        path.join(this.options.examplesDir, "favicon.ico"),
        "image/vnd.microsoft.icon"
      );
    });

    this.app.get("/routes", asyncRoute((req, res) => this.routeInfo(req, res)));

    this.app.get("/xrl", asyncRoute((req, res) => this.xrl(req, res)));

    this.app.get("/render", asyncRoute((req, res) => this.render(req, res)));

    this.app.get(
      "/images/:filename",
      asyncRoute((req, res, next) => this.getImage(req, res, next))
    );

    this.app.get(
      "/custom/:num(\\d+)",
      asyncRoute((req, res) => this.custom(req, res))
    );

    this.app.get(
      "/:name",
      asyncRoute((req, res, next) => this.serveStatic(req, res, next))
    );
  }

  /** Base URL of this server, without a trailing slash */
  baseUrl(req: express.Request): string {
    return this.options.publicBaseUrl ?? `${req.protocol}://${req.get("host")}`;
  }

  async listRoutes(baseUrl: string): Promise<RoutesListing> {
    const sites = await listExampleSites(this.options.examplesDir);
    return {
      example_sites: sites.map((name) => ({ name, url: `${baseUrl}/${name}` })),
      custom_sites: this.options.routes.list().map(({ slot }) => ({
        name: `custom-${slot}`,
        url: `${baseUrl}/custom/${slot}`,
      })),
    };
  }

  private async index(req: express.Request, res: express.Response): Promise<void> {
    const baseUrl = this.baseUrl(req);
    const customRoutes = this.options.routes.list();
    const firstCustom = customRoutes[0];
    const slotCount = this.options.routes.slotCount;

    const endpoints: EndpointRow[] = [
      ["", "/", "Page providing an overview of different app routes"],
      ["info", "/<name>", "Serves example site from 'examples' folder"],
      [
        "custom/1",
        "/custom/<int:num>",
        `Redirects to custom route number 'num' (out of ${slotCount})`,
      ],
      [
        `custom/1?url=${encodeURIComponent(firstCustom?.url ?? baseUrl)}`,
        "/custom/<int:num>?url=<url>",
        `Updates routing for custom site number 'num' (out of ${slotCount})`,
      ],
      [
        `xrl?url=${encodeURIComponent(`${baseUrl}/info`)}`,
        "/xrl?url=<url>",
        "Serves an emulated XRL layout for a given link",
      ],
      [
        `render?url=${encodeURIComponent(`${baseUrl}/info`)}`,
        "/render?url=<url>",
        "Render elements as images from a webpage using the given url",
      ],
      ["images/full_page.png", "/images/<filename>", "Get an image by filename"],
      [
        "routes",
        "/routes",
        "Serves JSON detailing available example and custom site links",
      ],
    ];

    const sites = await listExampleSites(this.options.examplesDir);

    res.type("html").send(
      renderIndexPage({
        baseUrl,
        endpoints,
        exampleSites: sites.map((site) => [
          site,
          site,
          `xrl?url=${encodeURIComponent(`${baseUrl}/${site}`)}`,
        ]),
        customSites: customRoutes.map(({ slot, url }) => [
          url,
          `custom/${slot}`,
          `xrl?url=${encodeURIComponent(url)}`,
        ]),
      })
    );
  }

  private async routeInfo(req: express.Request, res: express.Response): Promise<void> {
    res.json(await this.listRoutes(this.baseUrl(req)));
  }

  // Serves an emulated XRL layout for the page at ?url=
  private async xrl(req: express.Request, res: express.Response): Promise<void> {
    const url = readUrlParam(req.query);
    const page = await this.options.fetchPage(url);

    // Re-issue against the final URL so relative links resolve against it
    if (page.finalUrl !== url) {
      logDebug(`[xrl] ${url} redirected to ${page.finalUrl}`);
      res.redirect(302, buildSelfRedirect(req.path, page.finalUrl));
      return;
    }

    const doc = buildXrlDocument(page.html, url);
    logInfo(
      `[xrl] ${url}: head=${doc.head.length} left=${doc.left.length} main=${doc.main.length} right=${doc.right.length} below=${doc.below.length}`
    );
    res.type("html").send(renderXrlEmulator(doc));
  }

  // Renders the XRL sections of ?url= to images and returns their layout
  private async render(req: express.Request, res: express.Response): Promise<void> {
    const url = readUrlParam(req.query);
    const page = await this.options.fetchPage(url);

    if (page.finalUrl !== url) {
      logDebug(`[render] ${url} redirected to ${page.finalUrl}`);
      res.redirect(302, buildSelfRedirect(req.path, page.finalUrl));
      return;
    }

    const result = await this.options.renderer.render({
      url,
      baseUrl: this.baseUrl(req),
    });
    res.json(result);
  }

  private async getImage(
    req: express.Request,
    res: express.Response,
    next: express.NextFunction
  ): Promise<void> {
    const { filename } = req.params;
    if (!isSafeImageFilename(filename)) {
      throw new NotFoundError(`Image ${filename} not found`);
    }

    const filePath = path.join(this.options.imagesDir, filename);
    const stat = await fs.stat(filePath).catch((error: unknown) => {
      if (isMissingFileError(error)) return null;
      throw error;
    });
    if (!stat?.isFile()) {
      throw new NotFoundError(`Image ${filename} not found`);
    }

    this.sendFile(res, next, filePath);
  }

  // Redirects to, or with ?url= updates, custom route `num`
  private async custom(req: express.Request, res: express.Response): Promise<void> {
    const num = Number(req.params.num);
    const { url } = req.query;

    if (Array.isArray(url)) {
      throw new BadRequestError("Only one url parameter may be given");
    }

    if (typeof url === "string" && url !== "") {
      const updated = await this.options.routes.update(num, url);
      res.status(200).type("text").send(`Site ${num} updated to ${updated}`);
      return;
    }

    res.redirect(302, this.options.routes.resolve(num));
  }

  // Static assets, example sites, then numeric custom route aliases
  private async serveStatic(
    req: express.Request,
    res: express.Response,
    next: express.NextFunction
  ): Promise<void> {
    const { name } = req.params;

    const assetType = staticAssetType(name);
    if (assetType) {
      this.sendFile(res, next, path.join(this.options.examplesDir, name), assetType);
      return;
    }

    const sitePath = await resolveExampleSite(this.options.examplesDir, name);
    if (sitePath) {
      this.sendFile(res, next, sitePath, "html");
      return;
    }

    if (/^\d+$/.test(name)) {
      res.redirect(302, this.options.routes.resolve(Number(name)));
      return;
    }

    throw new NotFoundError(`No example site named ${name}`);
  }

  private sendFile(
    res: express.Response,
    next: express.NextFunction,
    filePath: string,
    contentType?: string
  ): void {
    if (contentType) res.type(contentType);
    res.sendFile(filePath, (err) => {
      if (!err) return;
      next(
        isMissingFileError(err)
          ? new NotFoundError(`${path.basename(filePath)} not found`)
          : err
      );
    });
  }
}

/**
 * Build the Express app with every XRL route and the JSON error handling.
 */
export function createApp(options: XrlConnectorOptions): express.Application {
  const app = express();
  app.use(cors());

  new XrlConnector(app, options);

  app.use(notFoundHandler);
  app.use(errorHandler);
  return app;
}
