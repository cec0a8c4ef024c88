import type * as k8s from "@kubernetes/client-node";
import type { ServicePort } from "./types";

export const FrontendFeatures = {
  ingress: "Ingress",
  externalIngress: "ExternalIngress",
  internalIngress: "InternalIngress",
  httpEnabled: "HTTPEnabled",
  hostBasedRouting: "HostBasedRouting",
  pathBasedRouting: "PathBasedRouting",
  tlsTermination: "TLSTermination",
  secretBasedCertsForTLS: "SecretBasedCertsForTLS",
  preSharedCertsForTLS: "PreSharedCertsForTLS",
  managedCertsForTLS: "ManagedCertsForTLS",
  staticGlobalIP: "StaticGlobalIP"
} as const;

export const BackendFeatures = {
  servicePort: "L7LBServicePort",
  externalServicePort: "L7XLBServicePort",
  internalServicePort: "L7ILBServicePort",
  neg: "NEG",
  cloudCDN: "CloudCDN",
  cloudArmor: "CloudArmor",
  cloudIAP: "CloudIAP",
  backendTimeout: "BackendTimeout",
  backendConnectionDraining: "BackendConnectionDraining",
  clientIPAffinity: "ClientIPAffinity",
  cookieAffinity: "CookieAffinity",
  customRequestHeaders: "CustomRequestHeaders"
} as const;

export const NegFeatures = {
  standaloneNeg: "StandaloneNEG",
  ingressNeg: "IngressNEG",
  asmNeg: "AsmNEG",
  neg: "NEG" // all of the above
} as const;

export type FrontendFeature = (typeof FrontendFeatures)[keyof typeof FrontendFeatures];
export type BackendFeature = (typeof BackendFeatures)[keyof typeof BackendFeatures];
export type NegFeature = (typeof NegFeatures)[keyof typeof NegFeatures];

// The kind of a ServicePort describes the backend itself, not how an Ingress uses it.
type ServicePortKindFeature =
  | typeof BackendFeatures.servicePort
  | typeof BackendFeatures.externalServicePort
  | typeof BackendFeatures.internalServicePort;

export type IngressBackendFeature = Exclude<BackendFeature, ServicePortKindFeature>;

/** Everything counted per Ingress. */
export type IngressFeature = FrontendFeature | IngressBackendFeature;

export const FRONTEND_FEATURES: readonly FrontendFeature[] = Object.values(FrontendFeatures);
export const BACKEND_FEATURES: readonly BackendFeature[] = Object.values(BackendFeatures);
export const NEG_FEATURES: readonly NegFeature[] = Object.values(NegFeatures);

export function isIngressBackendFeature(f: BackendFeature): f is IngressBackendFeature {
  return (
    f !== BackendFeatures.servicePort &&
    f !== BackendFeatures.externalServicePort &&
    f !== BackendFeatures.internalServicePort
  );
}

export const INGRESS_FEATURES: readonly IngressFeature[] = [
  ...FRONTEND_FEATURES,
  ...BACKEND_FEATURES.filter(isIngressBackendFeature)
];

// Annotations read by the classifier
export const ingressClassKey = "kubernetes.io/ingress.class";
export const gceL7ILBIngressClass = "gce-internal";
export const allowHTTPKey = "kubernetes.io/ingress.allow-http";
export const staticIPKey = "kubernetes.io/ingress.global-static-ip-name";
export const preSharedCertKey = "ingress.gcp.kubernetes.io/pre-shared-cert";
export const managedCertKey = "networking.gke.io/managed-certificates";

export const generatedCookieAffinity = "GENERATED_COOKIE";
export const clientIPAffinity = "CLIENT_IP";

const FALSE_VALUES = new Set(["0", "f", "F", "false", "FALSE", "False"]);

function hasAnnotation(annotations: Record<string, string>, key: string): boolean {
  const v = annotations[key];
  return typeof v === "string" && v.trim() !== "";
}

function isInternalIngress(ing: k8s.V1Ingress): boolean {
  const cls = ing.metadata?.annotations?.[ingressClassKey] ?? ing.spec?.ingressClassName;
  return cls === gceL7ILBIngressClass;
}

function isHTTPEnabled(annotations: Record<string, string>): boolean {
  const v = annotations[allowHTTPKey];
  if (v === undefined) return true;
  return !FALSE_VALUES.has(v);
}

function uniq<T>(items: T[]): T[] {
  return Array.from(new Set(items));
}

/**
 * Frontend features of an Ingress, in a fixed order, each at most once.
 */
export function featuresForIngress(ing: k8s.V1Ingress): FrontendFeature[] {
  const annotations = ing.metadata?.annotations ?? {};
  const rules = ing.spec?.rules ?? [];
  const features: FrontendFeature[] = [FrontendFeatures.ingress];

  features.push(isInternalIngress(ing) ? FrontendFeatures.internalIngress : FrontendFeatures.externalIngress);

  if (isHTTPEnabled(annotations)) features.push(FrontendFeatures.httpEnabled);

  if (rules.some((r) => !!r.host)) features.push(FrontendFeatures.hostBasedRouting);
  if (rules.some((r) => (r.http?.paths ?? []).length > 0)) features.push(FrontendFeatures.pathBasedRouting);

  const preShared = hasAnnotation(annotations, preSharedCertKey);
  const managed = hasAnnotation(annotations, managedCertKey);
  const secretBased = (ing.spec?.tls ?? []).some((t) => !!t.secretName);

  if (preShared) features.push(FrontendFeatures.preSharedCertsForTLS);
  if (managed) features.push(FrontendFeatures.managedCertsForTLS);
  if (secretBased) features.push(FrontendFeatures.secretBasedCertsForTLS);
  if (preShared || managed || secretBased) features.push(FrontendFeatures.tlsTermination);

  // TODO: internal Ingresses take a regional address; decide whether staticGlobalIP should be reported for them.
  if (hasAnnotation(annotations, staticIPKey)) features.push(FrontendFeatures.staticGlobalIP);

  return uniq(features);
}

/**
 * Backend features of a ServicePort, in a fixed order, each at most once.
 */
export function featuresForServicePort(sp: ServicePort): BackendFeature[] {
  const features: BackendFeature[] = [BackendFeatures.servicePort];

  features.push(sp.l7IlbEnabled ? BackendFeatures.internalServicePort : BackendFeatures.externalServicePort);

  if (sp.negEnabled) features.push(BackendFeatures.neg);

  const spec = sp.backendConfig?.spec;
  if (!spec) return features;

  if (spec.cdn?.enabled) features.push(BackendFeatures.cloudCDN);
  if (spec.iap?.enabled) features.push(BackendFeatures.cloudIAP);

  const affinity = spec.sessionAffinity?.affinityType;
  if (affinity === generatedCookieAffinity) {
    features.push(BackendFeatures.cookieAffinity);
  } else if (affinity === clientIPAffinity) {
    features.push(BackendFeatures.clientIPAffinity);
  }

  if (spec.securityPolicy?.name) features.push(BackendFeatures.cloudArmor);
  if (spec.connectionDraining) features.push(BackendFeatures.backendConnectionDraining);
  if (spec.timeoutSec !== undefined) features.push(BackendFeatures.backendTimeout);
  if (spec.customRequestHeaders) features.push(BackendFeatures.customRequestHeaders);

  return uniq(features);
}
