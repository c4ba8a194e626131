export type JsonObject = Record<string, unknown>;

/** Acknowledgement body most mutating endpoints return. */
export type StatusResponse = {
  status: string;
  message?: string;
};
