// Types for Google Smart Home outbound responses

export interface GoogleDeviceName {
  name?: string;
  nicknames?: unknown[];
}

/**
 * Device record returned for the SYNC intent
 */
export interface DeviceDescriptor {
  id: string;
  type: string;
  traits: string[];
  name: GoogleDeviceName;
  willReportState: false; // state reporting is not implemented
}

/**
 * Device state returned for the QUERY intent
 */
export interface QueryResult {
  on: boolean;
  online: true;
  brightness: number; // 0-100
}

export interface OfflineDeviceState {
  online: false;
}

export type QueryDeviceState = QueryResult | OfflineDeviceState;

export interface SyncResponsePayload {
  agentUserId: string;
  devices: DeviceDescriptor[];
}

export interface QueryResponsePayload {
  devices: Record<string, QueryDeviceState>;
}

export interface ExecuteResponseCommand {
  ids: string[];
  status: "SUCCESS" | "ERROR";
  states: Record<string, unknown>;
  debugString?: string;
}

export interface ExecuteResponsePayload {
  commands: ExecuteResponseCommand[];
}

export type SmartHomeResponsePayload =
  | SyncResponsePayload
  | QueryResponsePayload
  | ExecuteResponsePayload;

export type SmartHomeResponseBase<T> = {
  requestId: string;
  payload: T;
};

export type SmartHomeResponse = SmartHomeResponseBase<SmartHomeResponsePayload>;
