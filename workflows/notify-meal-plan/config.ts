export const JOB_TYPES = ["daily", "weekly", "monthly"] as const;

export type JobType = (typeof JOB_TYPES)[number];

export const isJobType = (value: string | undefined): value is JobType =>
  JOB_TYPES.some((type) => type === value);
