import type * as k8s from "@kubernetes/client-node";
import type { ServicePortID, ServicePortKey } from "./types";

// The API server puts namespaced objects created without one in "default".
export const DEFAULT_NAMESPACE = "default";

export function namespaceOf(ing: k8s.V1Ingress): string {
  return ing.metadata?.namespace || DEFAULT_NAMESPACE;
}

export function ingressKey(ing: k8s.V1Ingress): string {
  return `${namespaceOf(ing)}/${ing.metadata?.name ?? ""}`;
}

export function servicePortKey(id: ServicePortID): ServicePortKey {
  return `${id.service.namespace}|${id.service.name}|${id.port}`;
}
