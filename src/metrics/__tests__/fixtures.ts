import type * as k8s from "@kubernetes/client-node";
import type { ServicePort } from "../types";

export const testNamespace = "shop";
const ttlSec = 30;

export function ingress(
  name: string,
  opts: { annotations?: Record<string, string>; spec?: k8s.V1IngressSpec } = {}
): k8s.V1Ingress {
  return {
    apiVersion: "networking.k8s.io/v1",
    kind: "Ingress",
    metadata: { name, namespace: testNamespace, annotations: opts.annotations },
    spec: opts.spec
  };
}

export function serviceBackend(name: string, port: number | string): k8s.V1IngressBackend {
  return {
    service: { name, port: typeof port === "number" ? { number: port } : { name: port } }
  };
}

export function path(p: string, svc: string, port: number | string): k8s.V1HTTPIngressPath {
  return { path: p, pathType: "Prefix", backend: serviceBackend(svc, port) };
}

export function rule(host: string | undefined, ...paths: k8s.V1HTTPIngressPath[]): k8s.V1IngressRule {
  return paths.length ? { host, http: { paths } } : { host };
}

function id(name: string, port: number) {
  return { service: { namespace: testNamespace, name }, port };
}

/** External backend with CDN, cookie affinity, Cloud Armor and draining. */
export const storefront: ServicePort = {
  id: id("storefront", 80),
  backendConfig: {
    spec: {
      cdn: { enabled: true, cachePolicy: {} },
      sessionAffinity: { affinityType: "GENERATED_COOKIE", affinityCookieTtlSec: ttlSec },
      securityPolicy: { name: "edge-policy" },
      connectionDraining: { drainingTimeoutSec: ttlSec }
    }
  }
};

/** External NEG backend with IAP, client IP affinity, timeout and an empty header list. */
export const checkout: ServicePort = {
  id: id("checkout", 8080),
  negEnabled: true,
  backendConfig: {
    spec: {
      iap: { enabled: true },
      sessionAffinity: { affinityType: "CLIENT_IP", affinityCookieTtlSec: ttlSec },
      timeoutSec: ttlSec,
      customRequestHeaders: { headers: [] }
    }
  }
};

/** Same identity as storefront, but internal NEG without a BackendConfig. */
export const storefrontInternal: ServicePort = {
  id: id("storefront", 80),
  negEnabled: true,
  l7IlbEnabled: true
};

/** Internal NEG backend with IAP, cookie affinity and draining. */
export const inventory: ServicePort = {
  id: id("inventory", 9000),
  negEnabled: true,
  l7IlbEnabled: true,
  backendConfig: {
    spec: {
      iap: { enabled: true },
      sessionAffinity: { affinityType: "GENERATED_COOKIE", affinityCookieTtlSec: ttlSec },
      connectionDraining: { drainingTimeoutSec: ttlSec }
    }
  }
};
