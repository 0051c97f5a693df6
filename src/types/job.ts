/**
 * Canonical job record
 * Every source adapter normalizes its provider payload to this structure
 */
export interface JobRecord {
  readonly identity: string;
  readonly nativeId?: string;
  readonly title: string;
  readonly company: string;
  readonly location: string;
  readonly salary?: string;
  readonly skills: readonly string[];
  readonly url: string;
  readonly sourceName: string;
  /** Title + description, used for classification only */
  readonly rawText: string;
  readonly description: string;
  readonly postedAt?: Date;
  readonly employmentType?: string;
}

export const JOB_LEVELS = ['Junior', 'Middle', 'Senior', 'Unknown'] as const;

export type JobLevel = (typeof JOB_LEVELS)[number];

export interface ClassificationResult {
  readonly level: JobLevel;
  readonly isRelevant: boolean;
  /** Entries of the tech-stack list found in the raw text, in list order */
  readonly techStack: readonly string[];
}

export interface ClassifiedJob {
  readonly job: JobRecord;
  readonly classification: ClassificationResult;
}

/**
 * Keyword signal sets driving classification
 */
export interface SignalSets {
  juniorSignals: string[];
  middleSignals: string[];
  seniorSignals: string[];
  itRoles: string[];
  remoteKeywords: string[];
  techStack: string[];
}
