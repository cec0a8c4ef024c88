import type * as k8s from "@kubernetes/client-node";

export type NamespacedName = {
  namespace: string;
  name: string;
};

// `${namespace}|${name}|${port}`, see servicePortKey()
export type ServicePortKey = string;

export type ServicePortID = {
  service: NamespacedName;
  port: number | string; // port number or named port
};

export type CDNConfig = {
  enabled: boolean;
  cachePolicy?: {
    includeHost?: boolean;
    includeProtocol?: boolean;
    includeQueryString?: boolean;
    queryStringBlacklist?: string[];
    queryStringWhitelist?: string[];
  };
};

export type IAPConfig = {
  enabled: boolean;
  oauthclientCredentials?: { secretName: string };
};

export type SessionAffinityConfig = {
  affinityType?: string; // "GENERATED_COOKIE" | "CLIENT_IP" | "NONE"
  affinityCookieTtlSec?: number;
};

export type BackendConfigSpec = {
  cdn?: CDNConfig;
  iap?: IAPConfig;
  sessionAffinity?: SessionAffinityConfig;
  securityPolicy?: { name: string };
  connectionDraining?: { drainingTimeoutSec?: number };
  timeoutSec?: number;
  /**
   * Presence of this object enables the feature, even with an empty header list.
   */
  customRequestHeaders?: { headers?: string[] };
};

export type BackendConfig = {
  metadata?: k8s.V1ObjectMeta;
  spec: BackendConfigSpec;
};

/**
 * A resolved Ingress backend. Two ServicePorts with the same `id` are the
 * same backend for counting purposes.
 */
export type ServicePort = {
  id: ServicePortID;
  negEnabled?: boolean;
  l7IlbEnabled?: boolean;
  backendConfig?: BackendConfig;
};

/** An Ingress and the ServicePorts it routes to. */
export type IngressState = {
  ingress: k8s.V1Ingress;
  servicePorts: ServicePort[];
};

/** NEG usage tallied for one Service. */
export type NegServiceState = {
  standaloneNeg: number; // standalone NEGs
  ingressNeg: number;    // NEGs created for Ingress
  asmNeg: number;        // NEGs created for ASM
};

export function newIngressState(ingress: k8s.V1Ingress, servicePorts: ServicePort[]): IngressState {
  return { ingress, servicePorts };
}

export function newNegServiceState(standaloneNeg: number, ingressNeg: number, asmNeg: number): NegServiceState {
  return { standaloneNeg, ingressNeg, asmNeg };
}

/** Adds, updates and removes Ingress state used for usage metrics. */
export type IngressMetricsCollector = {
  setIngress(ingKey: string, state: IngressState): void;
  deleteIngress(ingKey: string): void;
};

/** Adds, updates and removes per-Service NEG state used for usage metrics. */
export type NegMetricsCollector = {
  setNegService(svcKey: string, state: NegServiceState): void;
  deleteNegService(svcKey: string): void;
};
