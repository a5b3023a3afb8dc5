export const Priority = {
  Normal: 1,
  Medium: 2,
  High: 3,
  Urgent: 4,
} as const;

export type Priority = (typeof Priority)[keyof typeof Priority];

export const PriorityName: Record<Priority, string> = {
  [Priority.Normal]: 'Normal',
  [Priority.Medium]: 'Medium',
  [Priority.High]: 'High',
  [Priority.Urgent]: 'Urgent',
};

export function isPriority(value: number): value is Priority {
  return value === Priority.Normal
    || value === Priority.Medium
    || value === Priority.High
    || value === Priority.Urgent;
}
