import type * as k8s from "@kubernetes/client-node";
import { namespaceOf, servicePortKey } from "./keys";
import type { ServicePortID } from "./types";

function toServicePortId(backend: k8s.V1IngressBackend | undefined, namespace: string): ServicePortID | undefined {
  const svc = backend?.service;
  if (!svc?.name) return undefined;

  // port.number wins over port.name when both are set
  const port = svc.port?.number ?? svc.port?.name;
  if (port === undefined || port === "") return undefined;

  return { service: { namespace, name: svc.name }, port };
}

/**
 * ServicePort identities an Ingress routes to: the default backend first,
 * then every rule path backend in order. Resource backends are skipped.
 * The reconciler resolves these into ServicePorts before calling setIngress().
 */
export function servicePortIdsForIngress(ing: k8s.V1Ingress): ServicePortID[] {
  const namespace = namespaceOf(ing);
  const candidates: Array<ServicePortID | undefined> = [toServicePortId(ing.spec?.defaultBackend, namespace)];

  for (const rule of ing.spec?.rules ?? []) {
    for (const p of rule.http?.paths ?? []) {
      candidates.push(toServicePortId(p.backend, namespace));
    }
  }

  const seen = new Set<string>();
  return candidates.filter((id): id is ServicePortID => {
    if (!id) return false;
    const k = servicePortKey(id);
    if (seen.has(k)) return false;
    seen.add(k);
    return true;
  });
}
