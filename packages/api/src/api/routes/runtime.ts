import type { Express } from "express";
import { CACHE_TTL } from "@didscan/shared";
import type { ApiContext } from "../types.js";
import { detailHandler, listHandler } from "../resource-handlers.js";
import {
  runtimeCallDetail,
  runtimeCallList,
  runtimeConstantDetail,
  runtimeConstantList,
  runtimeDetail,
  runtimeEventDetail,
  runtimeEventList,
  runtimeList,
  runtimeModuleDetail,
  runtimeModuleList,
  runtimeStorageDetail,
  runtimeTypeList,
} from "../resources/runtime.js";

// Runtime metadata never changes once a spec version is indexed
const RUNTIME_METADATA = { ttl: CACHE_TTL.runtimeMetadata };

export function register(app: Express, ctx: ApiContext): void {
  /**
   * @openapi
   * /api/v1/runtime:
   *   get:
   *     tags: [Runtime]
   *     summary: List runtimes
   *     parameters:
   *       - $ref: '#/components/parameters/PageNumber'
   *       - $ref: '#/components/parameters/PageSize'
   *     responses:
   *       200:
   *         description: Paginated runtimes, newest first
   */
  app.get("/api/v1/runtime", listHandler(ctx, runtimeList));

  /**
   * @openapi
   * /api/v1/runtime/{id}:
   *   get:
   *     tags: [Runtime]
   *     summary: Get runtime by id
   *     parameters:
   *       - in: path
   *         name: id
   *         required: true
   *         schema:
   *           type: string
   *       - in: query
   *         name: include
   *         schema:
   *           type: string
   *         description: Comma list of modules, types
   *     responses:
   *       200:
   *         description: Runtime
   *       404:
   *         description: Not found
   */
  app.get("/api/v1/runtime/:id", detailHandler(ctx, runtimeDetail, RUNTIME_METADATA));

  /**
   * @openapi
   * /api/v1/runtime-call:
   *   get:
   *     tags: [Runtime]
   *     summary: List runtime calls
   *     parameters:
   *       - in: query
   *         name: filter[latestRuntime]
   *         schema:
   *           type: string
   *         description: Any non-empty value restricts to the newest spec version
   *       - in: query
   *         name: filter[module_id]
   *         schema:
   *           type: string
   *       - $ref: '#/components/parameters/PageNumber'
   *       - $ref: '#/components/parameters/PageSize'
   *     responses:
   *       200:
   *         description: Paginated calls by spec version, module and call
   */
  app.get("/api/v1/runtime-call", listHandler(ctx, runtimeCallList, RUNTIME_METADATA));

  /**
   * @openapi
   * /api/v1/runtime-call/{id}:
   *   get:
   *     tags: [Runtime]
   *     summary: 'Get runtime call by "{spec_version}-{module_id}-{call_id}"'
   *     parameters:
   *       - in: path
   *         name: id
   *         required: true
   *         schema:
   *           type: string
   *       - in: query
   *         name: include
   *         schema:
   *           type: string
   *         description: Comma list of params, recent_extrinsics
   *     responses:
   *       200:
   *         description: Runtime call
   *       404:
   *         description: Not found
   */
  app.get("/api/v1/runtime-call/:id", detailHandler(ctx, runtimeCallDetail, RUNTIME_METADATA));

  /**
   * @openapi
   * /api/v1/runtime-event:
   *   get:
   *     tags: [Runtime]
   *     summary: List runtime events
   *     parameters:
   *       - in: query
   *         name: filter[latestRuntime]
   *         schema:
   *           type: string
   *         description: Any non-empty value restricts to the newest spec version
   *       - in: query
   *         name: filter[module_id]
   *         schema:
   *           type: string
   *       - $ref: '#/components/parameters/PageNumber'
   *       - $ref: '#/components/parameters/PageSize'
   *     responses:
   *       200:
   *         description: Paginated events by spec version, module and event
   */
  app.get("/api/v1/runtime-event", listHandler(ctx, runtimeEventList, RUNTIME_METADATA));

  /**
   * @openapi
   * /api/v1/runtime-event/{id}:
   *   get:
   *     tags: [Runtime]
   *     summary: 'Get runtime event by "{spec_version}-{module_id}-{event_id}"'
   *     parameters:
   *       - in: path
   *         name: id
   *         required: true
   *         schema:
   *           type: string
   *       - in: query
   *         name: include
   *         schema:
   *           type: string
   *         description: Comma list of attributes, recent_events
   *     responses:
   *       200:
   *         description: Runtime event
   *       404:
   *         description: Not found
   */
  app.get("/api/v1/runtime-event/:id", detailHandler(ctx, runtimeEventDetail, RUNTIME_METADATA));

  /**
   * @openapi
   * /api/v1/runtime-type:
   *   get:
   *     tags: [Runtime]
   *     summary: List runtime types
   *     parameters:
   *       - in: query
   *         name: filter[latestRuntime]
   *         schema:
   *           type: string
   *         description: Any non-empty value restricts to the newest spec version
   *       - $ref: '#/components/parameters/PageNumber'
   *       - $ref: '#/components/parameters/PageSize'
   *     responses:
   *       200:
   *         description: Paginated types by spec version and type string
   */
  app.get("/api/v1/runtime-type", listHandler(ctx, runtimeTypeList, RUNTIME_METADATA));

  /**
   * @openapi
   * /api/v1/runtime-module:
   *   get:
   *     tags: [Runtime]
   *     summary: List runtime modules
   *     parameters:
   *       - in: query
   *         name: filter[latestRuntime]
   *         schema:
   *           type: string
   *         description: Any non-empty value restricts to the newest spec version
   *       - $ref: '#/components/parameters/PageNumber'
   *       - $ref: '#/components/parameters/PageSize'
   *     responses:
   *       200:
   *         description: Paginated modules by spec version and name
   */
  app.get("/api/v1/runtime-module", listHandler(ctx, runtimeModuleList, RUNTIME_METADATA));

  /**
   * @openapi
   * /api/v1/runtime-module/{id}:
   *   get:
   *     tags: [Runtime]
   *     summary: 'Get runtime module by "{spec_version}-{module_id}"'
   *     parameters:
   *       - in: path
   *         name: id
   *         required: true
   *         schema:
   *           type: string
   *       - in: query
   *         name: include
   *         schema:
   *           type: string
   *         description: Comma list of calls, events, storage, constants, errors
   *     responses:
   *       200:
   *         description: Runtime module
   *       404:
   *         description: Not found
   */
  app.get("/api/v1/runtime-module/:id", detailHandler(ctx, runtimeModuleDetail, RUNTIME_METADATA));

  /**
   * @openapi
   * /api/v1/runtime-storage/{id}:
   *   get:
   *     tags: [Runtime]
   *     summary: 'Get storage function by "{spec_version}-{module_id}-{name}"'
   *     parameters:
   *       - in: path
   *         name: id
   *         required: true
   *         schema:
   *           type: string
   *     responses:
   *       200:
   *         description: Storage function
   *       404:
   *         description: Not found
   */
  app.get("/api/v1/runtime-storage/:id", detailHandler(ctx, runtimeStorageDetail, RUNTIME_METADATA));

  /**
   * @openapi
   * /api/v1/runtime-constant:
   *   get:
   *     tags: [Runtime]
   *     summary: List runtime constants
   *     parameters:
   *       - $ref: '#/components/parameters/PageNumber'
   *       - $ref: '#/components/parameters/PageSize'
   *     responses:
   *       200:
   *         description: Paginated constants, newest spec version first
   */
  app.get("/api/v1/runtime-constant", listHandler(ctx, runtimeConstantList, RUNTIME_METADATA));

  /**
   * @openapi
   * /api/v1/runtime-constant/{id}:
   *   get:
   *     tags: [Runtime]
   *     summary: 'Get constant by "{spec_version}-{module_id}-{name}"'
   *     parameters:
   *       - in: path
   *         name: id
   *         required: true
   *         schema:
   *           type: string
   *     responses:
   *       200:
   *         description: Runtime constant
   *       404:
   *         description: Not found
   */
  app.get("/api/v1/runtime-constant/:id", detailHandler(ctx, runtimeConstantDetail, RUNTIME_METADATA));
}
