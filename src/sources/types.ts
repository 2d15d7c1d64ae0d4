export interface CandidateProject {
  name: string;
  url: string;
  description: string | null;
  language: string | null;
  stars: number;
  forks: number;
  openIssues: number;
  /** Repository size in KB, as reported by the search API. */
  size: number;
  topics: string[];
  createdAt: string;
  pushedAt: string;
}

export interface ScoredProject extends CandidateProject {
  qualityScore: number;
}

export interface AnalyzedProject extends ScoredProject {
  analysis: string;
}
