import { ClientConfig, ClientDefaults } from "../config";
import { HttpMethod, QueryValue } from "../adapters/transport/Transport";
import { EndpointName, Placeholder, resolveEndpoint } from "./endpoints";

/**
 * Header that carries the organization id. Call-placing operations use
 * `organization`; everything else uses `encrypted_key`.
 */
export type OrgHeader = "encrypted_key" | "organization";

export type Credentials = {
  authToken: string;
};

export type OrgScoped = Credentials & {
  /** Enterprise sub-account. Sent only when set. */
  orgId?: string;
};

export type WireBody = Record<string, unknown>;
export type WireQuery = Record<string, QueryValue | undefined>;

type StringKey<P> = {
  [K in keyof P]-?: P[K] extends string | undefined ? K : never;
}[keyof P] &
  keyof P;

type OperationSpec<P extends Credentials, E extends EndpointName> = {
  name: string;
  method: HttpMethod;
  endpoint: E;
  orgHeader: OrgHeader | null;
  /** Param key → wire name. Checked in order, before `prepare`. */
  required?: { [K in keyof P]?: string };
  /** Template placeholder → param key holding its value. */
  path?: { [K in Placeholder<E>]: StringKey<P> };
  /** Operation rules. Throws a ValidationError, or returns the cleaned params. */
  prepare?: (params: P, defaults: ClientDefaults) => P;
  body?: (params: P, defaults: ClientDefaults) => WireBody;
  query?: (params: P, defaults: ClientDefaults) => WireQuery;
};

export type Operation<P extends Credentials, R> = {
  readonly name: string;
  readonly method: HttpMethod;
  readonly endpoint: EndpointName;
  readonly orgHeader: OrgHeader | null;
  /** `[param key, wire name]` pairs, in checking order. */
  readonly required: ReadonlyArray<readonly [string, string]>;
  /** Type-only: the decoded success body. Never set. */
  readonly response?: R;
  prepare(params: P, defaults: ClientDefaults): P;
  url(params: P, config: ClientConfig): string;
  body?(params: P, defaults: ClientDefaults): WireBody;
  query?(params: P, defaults: ClientDefaults): WireQuery;
};

/**
 * Declares one provider operation. Curried so the params and response types
 * are given explicitly while the endpoint name is inferred:
 *
 *   defineOperation<GetPathwayParams, Pathway>()({ endpoint: "pathwayDetails", ... })
 */
export function defineOperation<P extends Credentials, R = unknown>() {
  return <E extends EndpointName>(spec: OperationSpec<P, E>): Operation<P, R> => {
    const path: Partial<Record<string, keyof P>> = spec.path ?? {};
    return {
      name: spec.name,
      method: spec.method,
      endpoint: spec.endpoint,
      orgHeader: spec.orgHeader,
      required: requiredEntries(spec.required),
      prepare: spec.prepare ?? ((params) => params),
      url(params, config) {
        const values: Record<string, string | undefined> = {};
        for (const [placeholder, key] of Object.entries(path)) {
          if (key !== undefined) values[placeholder] = stringAt(params, key);
        }
        return resolveEndpoint(config, spec.endpoint, values);
      },
      body: spec.body,
      query: spec.query
    };
  };
}

function requiredEntries(
  required: Readonly<Record<string, string | undefined>> | undefined
): Array<readonly [string, string]> {
  const out: Array<readonly [string, string]> = [];
  if (!required) return out;
  for (const key in required) {
    const wire = required[key];
    if (wire !== undefined) out.push([key, wire]);
  }
  return out;
}

function stringAt<P>(params: P, key: keyof P): string | undefined {
  const value: unknown = params[key];
  return typeof value === "string" ? value : undefined;
}
