export const FRAME_PRIORITIES = ['low', 'normal', 'high'] as const;

export type FramePriority = (typeof FRAME_PRIORITIES)[number];

const PRIORITY_RANK: Readonly<Record<FramePriority, number>> = {
  low: 0,
  normal: 1,
  high: 2,
};

export function priorityRank(priority: FramePriority): number {
  return PRIORITY_RANK[priority];
}
