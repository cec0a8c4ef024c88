import { logger as defaultLogger, type Logger } from "../logger";
import {
  BACKEND_FEATURES,
  featuresForIngress,
  featuresForServicePort,
  INGRESS_FEATURES,
  isIngressBackendFeature,
  NEG_FEATURES,
  NegFeatures,
  type BackendFeature,
  type IngressFeature,
  type NegFeature
} from "./features";
import { servicePortKey } from "./keys";
import { StateStore } from "./stateStore";
import type {
  IngressMetricsCollector,
  IngressState,
  NegMetricsCollector,
  NegServiceState,
  ServicePortKey
} from "./types";

export type FeatureCounts<F extends string> = Map<F, number>;

export type IngressMetrics = {
  /** Number of Ingresses using each feature, directly or through one of their ServicePorts. */
  ingressCount: FeatureCounts<IngressFeature>;
  /** Number of distinct ServicePorts using each backend feature. */
  servicePortCount: FeatureCounts<BackendFeature>;
};

export type NegMetrics = FeatureCounts<NegFeature>;

function zeroCounts<F extends string>(vocabulary: readonly F[]): FeatureCounts<F> {
  return new Map(vocabulary.map((f): [F, number] => [f, 0]));
}

function increment<F extends string>(counts: FeatureCounts<F>, f: F, by = 1) {
  counts.set(f, (counts.get(f) ?? 0) + by);
}

/**
 * Holds the latest Ingress and NEG states reported by the controllers and
 * folds them into usage counts on demand.
 */
export class ControllerMetrics implements IngressMetricsCollector, NegMetricsCollector {
  private readonly ingressStates = new StateStore<IngressState>();
  private readonly negStates = new StateStore<NegServiceState>();
  private readonly logger: Logger;

  constructor(opts?: { logger?: Logger }) {
    this.logger = opts?.logger ?? defaultLogger;
  }

  setIngress(ingKey: string, state: IngressState) {
    this.ingressStates.set(ingKey, state);
  }

  deleteIngress(ingKey: string) {
    this.ingressStates.delete(ingKey);
  }

  setNegService(svcKey: string, state: NegServiceState) {
    this.negStates.set(svcKey, state);
  }

  deleteNegService(svcKey: string) {
    this.negStates.delete(svcKey);
  }

  /**
   * Every known feature is present in both maps, zero when unused.
   *
   * A ServicePort referenced by several Ingresses is counted once in
   * `servicePortCount`. Identity is (namespace, service, port); the first
   * ServicePort seen for an identity is the one classified.
   */
  computeIngressMetrics(): IngressMetrics {
    const ingressCount = zeroCounts(INGRESS_FEATURES);
    const servicePortCount = zeroCounts(BACKEND_FEATURES);
    const servicePortFeatures = new Map<ServicePortKey, BackendFeature[]>();

    const states = this.ingressStates.snapshot();
    for (const state of states) {
      const features = new Set<IngressFeature>(featuresForIngress(state.ingress));

      for (const sp of state.servicePorts) {
        const key = servicePortKey(sp.id);
        let spFeatures = servicePortFeatures.get(key);
        if (!spFeatures) {
          spFeatures = featuresForServicePort(sp);
          servicePortFeatures.set(key, spFeatures);
        }
        for (const f of spFeatures) {
          if (isIngressBackendFeature(f)) features.add(f);
        }
      }

      for (const f of features) increment(ingressCount, f);
    }

    for (const spFeatures of servicePortFeatures.values()) {
      for (const f of spFeatures) increment(servicePortCount, f);
    }

    this.logger.debug(
      { ingresses: states.length, servicePorts: servicePortFeatures.size },
      "Computed ingress usage metrics"
    );
    return { ingressCount, servicePortCount };
  }

  /** Field-wise sum of every registered NEG state; `NEG` is the grand total. */
  computeNegMetrics(): NegMetrics {
    const counts = zeroCounts(NEG_FEATURES);
    const states = this.negStates.snapshot();

    for (const s of states) {
      increment(counts, NegFeatures.standaloneNeg, s.standaloneNeg);
      increment(counts, NegFeatures.ingressNeg, s.ingressNeg);
      increment(counts, NegFeatures.asmNeg, s.asmNeg);
      increment(counts, NegFeatures.neg, s.standaloneNeg + s.ingressNeg + s.asmNeg);
    }

    this.logger.debug({ services: states.length }, "Computed NEG usage metrics");
    return counts;
  }
}
