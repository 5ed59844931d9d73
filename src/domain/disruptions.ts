import { debug } from '../debug.js';
import type { ClusterSnapshot, Labels, PdbRecord, PodRecord, PriorityClassRecord, ReportRow } from './types.js';

/** True when every selector entry is present in `labels` with the same value. An empty selector matches nothing. */
export const isSubsetMatch = (selector: Labels, labels: Labels): boolean => {
  const keys = Object.keys(selector);
  if (keys.length === 0) return false;
  return keys.every((key) => Object.hasOwn(labels, key) && labels[key] === selector[key]);
};

/** First PDB in listing order that selects the pod. */
export const findMatchingPdb = (pod: PodRecord, pdbs: PdbRecord[]): PdbRecord | undefined =>
  pdbs
    .filter((pdb) => pdb.namespace === pod.namespace && Object.keys(pdb.matchLabels).length > 0)
    .find((pdb) => isSubsetMatch(pdb.matchLabels, pod.labels));

export const resolvePriority = (
  name: string | undefined,
  priorityClasses: PriorityClassRecord[],
): number | undefined => {
  if (name === undefined) return undefined;
  return priorityClasses.find((priorityClass) => priorityClass.name === name)?.value;
};

export const owningReplicaSet = (pod: PodRecord): string | undefined =>
  pod.ownerReferences.find((owner) => owner.kind === 'ReplicaSet')?.name;

export const buildReportRow = (
  pod: PodRecord,
  pdbs: PdbRecord[],
  priorityClasses: PriorityClassRecord[],
): ReportRow => {
  const pdb = findMatchingPdb(pod, pdbs);
  return {
    podName: pod.name,
    namespace: pod.namespace,
    replicaSet: owningReplicaSet(pod),
    priorityClassName: pod.priorityClassName,
    priorityValue: resolvePriority(pod.priorityClassName, priorityClasses),
    pdbName: pdb?.name,
    minAvailable: pdb?.minAvailable,
    maxUnavailable: pdb?.maxUnavailable,
  };
};

export const buildReportRows = (snapshot: ClusterSnapshot): ReportRow[] => {
  debug('buildReportRows start', {
    pods: snapshot.pods.length,
    pdbs: snapshot.pdbs.length,
    priorityClasses: snapshot.priorityClasses.length,
  });

  const rows = snapshot.pods.map((pod) => buildReportRow(pod, snapshot.pdbs, snapshot.priorityClasses));
  const withPdb = rows.filter((row) => row.pdbName !== undefined).length;

  debug('buildReportRows end', { rows: rows.length, withPdb, withoutPdb: rows.length - withPdb });
  return rows;
};
