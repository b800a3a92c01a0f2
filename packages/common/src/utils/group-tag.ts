/** Derives a grouping label from a pod name. */
export type GroupTagExtractor = (podName: string) => string;

/**
 * Pods created by a Deployment are named `<deployment>-<replicaset-hash>-<pod-hash>`;
 * the second-to-last segment groups the pods of one rollout. Best effort only.
 */
export const extractReplicaSetId: GroupTagExtractor = (podName) => {
  const parts = podName.split('-');
  if (parts.length < 2) {
    return '';
  }
  return parts[parts.length - 2] ?? '';
};
