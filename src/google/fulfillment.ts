import { match, P } from "ts-pattern";
import config from "../config.ts";
import { createLogger } from "../logger.ts";
import { domainOf, type EntityRegistry } from "../registry/types.ts";
import { safeParse } from "../utility.ts";
import {
  determineService,
  makeActionsResponse,
  mapQueryResponse,
  mapSyncResponse,
} from "./mapper.ts";
import {
  GOOGLE_INTENTS,
  SmartHomeRequestSchema,
  type ExecuteRequestPayload,
  type QueryRequestPayload,
} from "./schema.ts";
import type {
  ExecuteResponseCommand,
  ExecuteResponsePayload,
  QueryResponsePayload,
  SmartHomeResponse,
  SmartHomeResponsePayload,
  SyncResponsePayload,
} from "./types.ts";

const log = createLogger("google:fulfillment");

export class RequestError extends Error {}

export class FulfillmentController {
  private registry: EntityRegistry;
  private agentUserId: string;

  constructor(registry: EntityRegistry, agentUserId = config.agentUserId) {
    this.registry = registry;
    this.agentUserId = agentUserId;
  }

  handleFulfillment = async (
    requestData: unknown
  ): Promise<SmartHomeResponse> =>
    safeParse(requestData, SmartHomeRequestSchema)
      .toPromise()
      .then(
        ({ requestId, inputs: [input] }) =>
          match(input)
            .returnType<Promise<SmartHomeResponsePayload>>()
            .with({ intent: GOOGLE_INTENTS.SYNC }, () => this.handleSync())
            .with({ intent: GOOGLE_INTENTS.QUERY, payload: P.select() }, p =>
              this.handleQuery(p)
            )
            .with({ intent: GOOGLE_INTENTS.EXECUTE, payload: P.select() }, p =>
              this.handleExecute(p)
            )
            .exhaustive()
            .then(payload => makeActionsResponse(requestId, payload)),
        error => {
          log.error("fulfillment.error", error, { reason: "invalid_request" });
          throw new RequestError("Invalid Smart Home request");
        }
      );

  private handleSync = async (): Promise<SyncResponsePayload> => {
    const response = mapSyncResponse(
      this.agentUserId,
      this.registry.getEntities()
    );

    log.debug("fulfillment.response_sync", {
      devices: response.devices.length,
    });

    return response;
  };

  private handleQuery = async (
    request: QueryRequestPayload
  ): Promise<QueryResponsePayload> =>
    mapQueryResponse(
      request.devices.map(d => d.id),
      entityId => this.registry.getEntity(entityId)
    );

  private handleExecute = async (
    request: ExecuteRequestPayload
  ): Promise<ExecuteResponsePayload> => {
    const commandResults: ExecuteResponseCommand[] = [];

    for (const { devices, execution } of request.commands) {
      for (const { id } of devices) {
        for (const { command, params = {} } of execution) {
          const invocation = determineService(id, command, params);

          log.debug("fulfillment.request_execute", {
            entityId: id,
            command,
            service: invocation.service,
          });

          commandResults.push(
            await this.registry.callService(domainOf(id), invocation).then(
              (executed): ExecuteResponseCommand => ({
                ids: [id],
                status: executed ? "SUCCESS" : "ERROR",
                states: {},
              }),
              (error: unknown): ExecuteResponseCommand => {
                log.error("fulfillment.execute", error, {
                  entityId: id,
                  service: invocation.service,
                });
                return {
                  ids: [id],
                  status: "ERROR",
                  states: {},
                  debugString:
                    error instanceof Error ? error.message : String(error),
                };
              }
            )
          );
        }
      }
    }

    return { commands: commandResults };
  };
}
