export type Labels = Record<string, string>;

/** Kubernetes IntOrString, e.g. `2` or `"25%"`. */
export type IntOrString = number | string;

export interface OwnerReference {
  kind: string;
  name: string;
}

export interface PodRecord {
  name: string;
  namespace: string;
  labels: Labels;
  ownerReferences: OwnerReference[];
  priorityClassName?: string;
}

export interface PdbRecord {
  name: string;
  namespace: string;
  /** Empty when the PDB has no `matchLabels`; such a PDB matches no pod. */
  matchLabels: Labels;
  minAvailable?: IntOrString;
  maxUnavailable?: IntOrString;
}

export interface PriorityClassRecord {
  name: string;
  value: number;
}

export interface ReportRow {
  podName: string;
  namespace: string;
  replicaSet?: string;
  priorityClassName?: string;
  priorityValue?: number;
  pdbName?: string;
  minAvailable?: IntOrString;
  maxUnavailable?: IntOrString;
}

export interface ClusterSnapshot {
  pods: PodRecord[];
  pdbs: PdbRecord[];
  priorityClasses: PriorityClassRecord[];
}
