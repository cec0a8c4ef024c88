export { ControllerMetrics } from "./metrics/controllerMetrics";
export type { FeatureCounts, IngressMetrics, NegMetrics } from "./metrics/controllerMetrics";
export {
  BACKEND_FEATURES,
  BackendFeatures,
  FRONTEND_FEATURES,
  FrontendFeatures,
  INGRESS_FEATURES,
  NEG_FEATURES,
  NegFeatures,
  featuresForIngress,
  featuresForServicePort
} from "./metrics/features";
export type {
  BackendFeature,
  FrontendFeature,
  IngressBackendFeature,
  IngressFeature,
  NegFeature
} from "./metrics/features";
export { servicePortIdsForIngress } from "./metrics/backendRefs";
export { ingressKey, namespaceOf, servicePortKey } from "./metrics/keys";
export { newIngressState, newNegServiceState } from "./metrics/types";
export type {
  BackendConfig,
  BackendConfigSpec,
  IngressMetricsCollector,
  IngressState,
  NamespacedName,
  NegMetricsCollector,
  NegServiceState,
  ServicePort,
  ServicePortID
} from "./metrics/types";
export { MetricsExporter, createLogSink } from "./metrics/exporter";
export type { MetricsExporterOptions, MetricsSink } from "./metrics/exporter";
export { loadConfig } from "./config";
export type { MetricsConfig } from "./config";
export { ConfigError, MetricsExportError } from "./errors";
export { createLogger } from "./logger";
export type { Logger } from "./logger";
