/**
 * Gateway proxy document normalisation.
 *
 * The configuration store keeps one document per API proxy, in the gateway's
 * own export format. This module reduces such a document to the
 * ConfigurationSnapshot the scorer reads.
 */

import { z } from "zod";

import { InvalidInputError } from "../errors.js";
import { policyTypeFromClass } from "../policies.js";
import type {
  ConfigurationSnapshot,
  DeployedEnvironment,
  NonSslEndpoint,
  PolicyRef,
  SslCoverage,
} from "../schemas.js";

// ---------------------------------------------------------------------------
// Raw document schema (lenient)
// ---------------------------------------------------------------------------

const RawPolicySchema = z
  .object({
    _class: z.string().catch(""),
    enabled: z.boolean().optional().catch(undefined),
    order: z.number().int().optional().catch(undefined),
  })
  .passthrough();

const RawDeploySchema = z
  .object({
    deploy: z.boolean().catch(false),
    environmentName: z.string().optional().catch(undefined),
    accessUrl: z.string().catch(""),
    environmentCommunicationProtocolType: z.string().optional().catch(undefined),
  })
  .passthrough();

const RawRoutingAddressSchema = z.object({ address: z.string().catch("") }).passthrough();

const TraceSettingsSchema = z
  .object({ enableTraceLog: z.boolean().catch(false) })
  .passthrough()
  .optional()
  .catch(undefined);

const ObjectIdSchema = z.union([
  z.string(),
  z.number().transform(String),
  z.object({ $oid: z.string() }).transform((o) => o.$oid),
]);

export const ProxyDocumentSchema = z
  .object({
    _id: ObjectIdSchema.optional(),
    id: ObjectIdSchema.optional(),
    name: z.string().catch("Unknown"),
    requestPolicyList: z.array(RawPolicySchema).catch([]),
    responsePolicyList: z.array(RawPolicySchema).catch([]),
    errorPolicyList: z.array(RawPolicySchema).catch([]),
    apiProxyDeployList: z.array(RawDeploySchema).catch([]),
    routing: z
      .object({ routingAddressWrapperList: z.array(RawRoutingAddressSchema).catch([]) })
      .passthrough()
      .catch({ routingAddressWrapperList: [] }),
    applicationLogSettings: TraceSettingsSchema,
    traceSettings: TraceSettingsSchema,
  })
  .passthrough();

export type ProxyDocument = z.output<typeof ProxyDocumentSchema>;
type RawPolicy = z.output<typeof RawPolicySchema>;

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function toPolicyRefs(list: RawPolicy[]): PolicyRef[] {
  return list.map((p) => ({
    type: policyTypeFromClass(p._class),
    enabled: p.enabled ?? true,
    order: p.order ?? 0,
  }));
}

function coverage(total: number, sslCount: number, nonSslList: NonSslEndpoint[]): SslCoverage {
  return { total, sslCount, nonSslList, allSsl: total > 0 && sslCount === total };
}

/**
 * Client-side SSL from deployed environments. An `http://` access URL is
 * offending; any other non-https scheme counts against coverage unnamed.
 */
export function clientSslCoverage(doc: ProxyDocument): SslCoverage {
  const deployed = doc.apiProxyDeployList.filter((d) => d.deploy);
  const nonSsl: NonSslEndpoint[] = [];
  let ssl = 0;
  for (const d of deployed) {
    if (d.accessUrl.startsWith("https://")) ssl++;
    else if (d.accessUrl.startsWith("http://")) {
      nonSsl.push({ name: d.environmentName ?? "Unknown", url: d.accessUrl });
    }
  }
  return coverage(deployed.length, ssl, nonSsl);
}

/** Backend SSL from the routing address list. */
export function backendSslCoverage(doc: ProxyDocument): SslCoverage {
  const addresses = doc.routing.routingAddressWrapperList;
  const nonSsl: NonSslEndpoint[] = [];
  let ssl = 0;
  for (const a of addresses) {
    if (a.address.startsWith("https://")) ssl++;
    else if (a.address.startsWith("http://")) nonSsl.push({ name: a.address, url: a.address });
  }
  return coverage(addresses.length, ssl, nonSsl);
}

function deployedEnvironments(doc: ProxyDocument): DeployedEnvironment[] {
  return doc.apiProxyDeployList
    .filter((d) => d.deploy)
    .map((d) => ({
      name: d.environmentName ?? "Unknown",
      url: d.accessUrl,
      protocol: d.environmentCommunicationProtocolType,
    }));
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/**
 * Normalise a raw proxy document. Throws InvalidInputError when the document
 * is not an object or carries no id.
 */
export function normalizeProxyDocument(raw: unknown): ConfigurationSnapshot {
  const parsed = ProxyDocumentSchema.safeParse(raw);
  if (!parsed.success) {
    throw new InvalidInputError(`Malformed proxy document: ${parsed.error.issues[0]?.message ?? "not an object"}`);
  }
  const doc = parsed.data;
  const id = doc._id ?? doc.id;
  if (id === undefined) throw new InvalidInputError("Proxy document has no id");

  return {
    id,
    name: doc.name,
    policies: {
      request: toPolicyRefs(doc.requestPolicyList),
      response: toPolicyRefs(doc.responsePolicyList),
      error: toPolicyRefs(doc.errorPolicyList),
    },
    clientSsl: clientSslCoverage(doc),
    backendSsl: backendSslCoverage(doc),
    logsEnabled:
      (doc.applicationLogSettings?.enableTraceLog ?? false) ||
      (doc.traceSettings?.enableTraceLog ?? false),
    deployedEnvironments: deployedEnvironments(doc),
  };
}
