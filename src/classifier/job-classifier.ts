import type { ClassificationResult, JobLevel, JobRecord, SignalSets } from '../types/job';
import { containsAnyKeyword, findKeywords } from '../utils/text';

/**
 * Rule-based level and relevance classifier.
 *
 * Level precedence is Senior > Middle > Junior > Unknown: a single senior
 * signal outweighs any number of junior or middle ones.
 * Output depends on rawText alone.
 */
export class JobClassifier {
  private readonly signals: SignalSets;

  constructor(signals: SignalSets) {
    this.signals = {
      juniorSignals: [...signals.juniorSignals],
      middleSignals: [...signals.middleSignals],
      seniorSignals: [...signals.seniorSignals],
      itRoles: [...signals.itRoles],
      remoteKeywords: [...signals.remoteKeywords],
      techStack: [...signals.techStack],
    };
  }

  classify(job: Pick<JobRecord, 'rawText'>): ClassificationResult {
    const text = job.rawText;

    return {
      level: this.classifyLevel(text),
      isRelevant: containsAnyKeyword(text, this.signals.itRoles),
      techStack: findKeywords(text, this.signals.techStack),
    };
  }

  classifyLevel(text: string): JobLevel {
    if (containsAnyKeyword(text, this.signals.seniorSignals)) return 'Senior';
    if (containsAnyKeyword(text, this.signals.middleSignals)) return 'Middle';
    if (containsAnyKeyword(text, this.signals.juniorSignals)) return 'Junior';
    return 'Unknown';
  }
}
