/**
 * Deployment descriptor.
 *
 * The desired state the deploy stage asserts: one Deployment and one
 * Service, submitted together as a single `List` document. The cluster
 * owns the objects' lifecycle; the pipeline only renders the document and
 * observes convergence.
 */

import { PipelineError, validationError } from './errors';

export interface ResourceQuantities {
  memory: string;
  cpu: string;
}

export interface HttpProbe {
  path: string;
  initialDelaySeconds: number;
  periodSeconds: number;
}

export interface ServiceSpec {
  name: string;
  port: number;
  protocol: 'TCP' | 'UDP';
  type: 'ClusterIP' | 'NodePort' | 'LoadBalancer';
}

/** Everything needed to render the deployment + service pair. */
export interface DescriptorSpec {
  name: string;
  namespace: string;
  /** Value of the `app` label shared by pod template, selector and service. */
  appLabel: string;
  containerName: string;
  image: string;
  replicas: number;
  containerPort: number;
  resources: { requests: ResourceQuantities; limits: ResourceQuantities };
  readinessProbe?: HttpProbe;
  livenessProbe?: HttpProbe;
  service: ServiceSpec;
}

interface ObjectMeta {
  name: string;
  namespace: string;
  labels?: Record<string, string>;
}

interface ProbeObject {
  httpGet: { path: string; port: number };
  initialDelaySeconds: number;
  periodSeconds: number;
}

interface ContainerObject {
  name: string;
  image: string;
  ports: Array<{ containerPort: number }>;
  resources: { limits: ResourceQuantities; requests: ResourceQuantities };
  readinessProbe?: ProbeObject;
  livenessProbe?: ProbeObject;
}

export interface DeploymentObject {
  apiVersion: 'apps/v1';
  kind: 'Deployment';
  metadata: ObjectMeta;
  spec: {
    replicas: number;
    selector: { matchLabels: Record<string, string> };
    template: {
      metadata: { labels: Record<string, string> };
      spec: { containers: ContainerObject[] };
    };
  };
}

export interface ServiceObject {
  apiVersion: 'v1';
  kind: 'Service';
  metadata: ObjectMeta;
  spec: {
    selector: Record<string, string>;
    ports: Array<{ protocol: string; port: number; targetPort: number }>;
    type: string;
  };
}

export interface DescriptorDocument {
  apiVersion: 'v1';
  kind: 'List';
  items: [DeploymentObject, ServiceObject];
}

/** Label selector string for the descriptor's pods, e.g. `app=web`. */
export function podSelector(spec: Pick<DescriptorSpec, 'appLabel'>): string {
  return `app=${spec.appLabel}`;
}

function toProbe(probe: HttpProbe, port: number): ProbeObject {
  return {
    httpGet: { path: probe.path, port },
    initialDelaySeconds: probe.initialDelaySeconds,
    periodSeconds: probe.periodSeconds,
  };
}

/** Build the desired-state document from a spec. */
export function buildDescriptor(spec: DescriptorSpec): DescriptorDocument {
  const labels = { app: spec.appLabel };
  const container: ContainerObject = {
    name: spec.containerName,
    image: spec.image,
    ports: [{ containerPort: spec.containerPort }],
    resources: {
      limits: { ...spec.resources.limits },
      requests: { ...spec.resources.requests },
    },
  };
  if (spec.livenessProbe) container.livenessProbe = toProbe(spec.livenessProbe, spec.containerPort);
  if (spec.readinessProbe) container.readinessProbe = toProbe(spec.readinessProbe, spec.containerPort);

  return {
    apiVersion: 'v1',
    kind: 'List',
    items: [
      {
        apiVersion: 'apps/v1',
        kind: 'Deployment',
        metadata: { name: spec.name, namespace: spec.namespace },
        spec: {
          replicas: spec.replicas,
          selector: { matchLabels: { ...labels } },
          template: {
            metadata: { labels: { ...labels } },
            spec: { containers: [container] },
          },
        },
      },
      {
        apiVersion: 'v1',
        kind: 'Service',
        metadata: { name: spec.service.name, namespace: spec.namespace },
        spec: {
          selector: { ...labels },
          ports: [{ protocol: spec.service.protocol, port: spec.service.port, targetPort: spec.containerPort }],
          type: spec.service.type,
        },
      },
    ],
  };
}

/** Serialise for `kubectl apply -f -`. Key order is stable, so equal specs render equal text. */
export function renderDescriptor(doc: DescriptorDocument): string {
  return `${JSON.stringify(doc, null, 2)}\n`;
}

// --- Parsing ---

type JsonObject = Record<string, unknown>;

function isObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function invalid(message: string, path: string): never {
  throw new PipelineError(validationError(`Invalid deployment descriptor: ${message}`, { path }));
}

function obj(value: unknown, path: string): JsonObject {
  if (!isObject(value)) invalid('expected an object', path);
  return value;
}

function str(value: unknown, path: string): string {
  if (typeof value !== 'string' || value.length === 0) invalid('expected a non-empty string', path);
  return value;
}

function int(value: unknown, path: string): number {
  if (typeof value !== 'number' || !Number.isInteger(value) || value < 0) invalid('expected a non-negative integer', path);
  return value;
}

function first(value: unknown, path: string): unknown {
  if (!Array.isArray(value) || value.length === 0) invalid('expected a non-empty array', path);
  return value[0];
}

function labelsOf(value: unknown, path: string): Record<string, string> {
  const labels: Record<string, string> = {};
  for (const [key, v] of Object.entries(obj(value, path))) {
    labels[key] = str(v, `${path}.${key}`);
  }
  return labels;
}

function quantities(value: unknown, path: string): ResourceQuantities {
  const o = obj(value, path);
  return { memory: str(o.memory, `${path}.memory`), cpu: str(o.cpu, `${path}.cpu`) };
}

function probe(value: unknown, path: string): HttpProbe | undefined {
  if (value === undefined) return undefined;
  const o = obj(value, path);
  const httpGet = obj(o.httpGet, `${path}.httpGet`);
  return {
    path: str(httpGet.path, `${path}.httpGet.path`),
    initialDelaySeconds: int(o.initialDelaySeconds, `${path}.initialDelaySeconds`),
    periodSeconds: int(o.periodSeconds, `${path}.periodSeconds`),
  };
}

function sameLabels(a: Record<string, string>, b: Record<string, string>): boolean {
  const keys = Object.keys(a);
  return keys.length === Object.keys(b).length && keys.every((k) => a[k] === b[k]);
}

const SERVICE_TYPES: ReadonlyArray<ServiceSpec['type']> = ['ClusterIP', 'NodePort', 'LoadBalancer'];
const PROTOCOLS: ReadonlyArray<ServiceSpec['protocol']> = ['TCP', 'UDP'];

/**
 * Parse a rendered document back into its spec. Rejects documents whose
 * service selector does not select the deployment's pods.
 */
export function parseDescriptor(text: string): DescriptorSpec {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    invalid(err instanceof Error ? err.message : 'not JSON', '$');
  }
  const root = obj(raw, '$');
  if (!Array.isArray(root.items)) invalid('expected items', '$.items');

  const deployment = root.items.map((item, i) => obj(item, `$.items[${i}]`)).find((o) => o.kind === 'Deployment');
  const service = root.items.map((item, i) => obj(item, `$.items[${i}]`)).find((o) => o.kind === 'Service');
  if (!deployment) return invalid('missing Deployment', '$.items');
  if (!service) return invalid('missing Service', '$.items');

  const dMeta = obj(deployment.metadata, 'deployment.metadata');
  const dSpec = obj(deployment.spec, 'deployment.spec');
  const selector = labelsOf(obj(dSpec.selector, 'deployment.spec.selector').matchLabels, 'deployment.spec.selector.matchLabels');
  const template = obj(dSpec.template, 'deployment.spec.template');
  const podLabels = labelsOf(obj(template.metadata, 'template.metadata').labels, 'template.metadata.labels');
  if (!sameLabels(selector, podLabels)) invalid('deployment selector does not match pod labels', 'deployment.spec.selector');

  const container = obj(first(obj(template.spec, 'template.spec').containers, 'template.spec.containers'), 'container');
  const port = obj(first(container.ports, 'container.ports'), 'container.ports[0]');
  const resources = obj(container.resources, 'container.resources');

  const sMeta = obj(service.metadata, 'service.metadata');
  const sSpec = obj(service.spec, 'service.spec');
  const serviceSelector = labelsOf(sSpec.selector, 'service.spec.selector');
  if (!sameLabels(serviceSelector, podLabels)) invalid('service selector does not match pod labels', 'service.spec.selector');
  const sPort = obj(first(sSpec.ports, 'service.spec.ports'), 'service.spec.ports[0]');
  const containerPort = int(port.containerPort, 'container.ports[0].containerPort');
  if (int(sPort.targetPort, 'service.spec.ports[0].targetPort') !== containerPort) {
    invalid('service targetPort does not match containerPort', 'service.spec.ports[0].targetPort');
  }

  const serviceType = str(sSpec.type, 'service.spec.type');
  const protocol = str(sPort.protocol, 'service.spec.ports[0].protocol');
  const matchedType = SERVICE_TYPES.find((t) => t === serviceType);
  const matchedProtocol = PROTOCOLS.find((p) => p === protocol);
  if (!matchedType) return invalid(`unsupported service type ${serviceType}`, 'service.spec.type');
  if (!matchedProtocol) return invalid(`unsupported protocol ${protocol}`, 'service.spec.ports[0].protocol');

  const appLabel = podLabels.app;
  if (!appLabel) return invalid('pods carry no app label', 'template.metadata.labels');

  const spec: DescriptorSpec = {
    name: str(dMeta.name, 'deployment.metadata.name'),
    namespace: str(dMeta.namespace, 'deployment.metadata.namespace'),
    appLabel,
    containerName: str(container.name, 'container.name'),
    image: str(container.image, 'container.image'),
    replicas: int(dSpec.replicas, 'deployment.spec.replicas'),
    containerPort,
    resources: {
      requests: quantities(resources.requests, 'container.resources.requests'),
      limits: quantities(resources.limits, 'container.resources.limits'),
    },
    service: {
      name: str(sMeta.name, 'service.metadata.name'),
      port: int(sPort.port, 'service.spec.ports[0].port'),
      protocol: matchedProtocol,
      type: matchedType,
    },
  };
  const readiness = probe(container.readinessProbe, 'container.readinessProbe');
  const liveness = probe(container.livenessProbe, 'container.livenessProbe');
  if (readiness) spec.readinessProbe = readiness;
  if (liveness) spec.livenessProbe = liveness;
  return spec;
}
