/**
 * Issues Analyzer
 * Fetches one page each of open, closed and all issues plus open pull
 * requests, then aggregates them without an LLM. The LLM categorization,
 * pattern and metadata steps are opt-in and fall back to label- and
 * count-based answers.
 */

import { GitHubTools } from '../clients/github-tools.js';
import { TextGenerator } from '../clients/text-generator.js';
import { createLogger } from '../shared/index.js';
import {
  CategorizedIssueRef,
  CategorizedIssues,
  DirectMetadata,
  Issue,
  IssueCategory,
  IssuePatterns,
  IssuesAnalyzerResult,
  LlmIssueInsights,
  LlmIssueMetadata,
  PullRequest,
  RepositoryRef,
} from '../types/index.js';
import {
  calculateStatistics,
  categorizeByLabels,
  countLabels,
  extractDirectMetadata,
  extractInsights,
  topContributors,
} from '../utils/analyzers.js';
import { parseIssue, parseIssues, parsePullRequests, truncateText } from '../utils/extractors.js';
import { JsonShape, asString, asStringArray, isRecord } from '../utils/json-response.js';
import { ProgressReporter, silentProgress } from './progress-reporter.js';
import { generateStructured } from './structured-generation.js';

const log = createLogger('IssuesAnalyzer');

/** Page sizes per fetch */
export const FETCH_LIMITS = {
  openIssues: 100,
  closedIssues: 50,
  allIssues: 100,
  pullRequests: 30,
} as const;

export const RECENT_ITEMS = 15;

export interface IssuesAnalyzerOptions {
  progress?: ProgressReporter;
  /** Run the LLM categorization, pattern and metadata steps */
  llmInsights?: boolean;
}

// ============================================
// Reply shapes
// ============================================

const CATEGORIES: IssueCategory[] = ['bugs', 'features', 'enhancements', 'documentation', 'questions', 'other'];

function categorizedRefs(value: unknown): CategorizedIssueRef[] {
  if (!Array.isArray(value)) {
    return [];
  }
  const refs: CategorizedIssueRef[] = [];
  for (const entry of value) {
    if (!isRecord(entry) || typeof entry.number !== 'number') {
      continue;
    }
    const ref: CategorizedIssueRef = { number: entry.number, title: asString(entry.title) ?? '' };
    const priority = asString(entry.priority);
    const status = asString(entry.status);
    if (priority !== null) ref.priority = priority;
    if (status !== null) ref.status = status;
    refs.push(ref);
  }
  return refs;
}

/**
 * Categorization reply; at least one category must be present as a list
 */
export const categorizedIssuesShape: JsonShape<CategorizedIssues> = (value) => {
  if (!isRecord(value)) {
    return null;
  }
  const reply = value;
  if (!CATEGORIES.some((category) => Array.isArray(reply[category]))) {
    return null;
  }
  return {
    bugs: categorizedRefs(value.bugs),
    features: categorizedRefs(value.features),
    enhancements: categorizedRefs(value.enhancements),
    documentation: categorizedRefs(value.documentation),
    questions: categorizedRefs(value.questions),
    other: categorizedRefs(value.other),
  };
};

export const issuePatternsShape: JsonShape<IssuePatterns> = (value) => {
  if (!isRecord(value)) {
    return null;
  }
  return {
    common_bug_areas: asStringArray(value.common_bug_areas),
    frequent_feature_requests: asStringArray(value.frequent_feature_requests),
    pain_points: asStringArray(value.pain_points),
    improvement_opportunities: asStringArray(value.improvement_opportunities),
  };
};

function countRecord(value: unknown): Record<string, number> {
  if (!isRecord(value)) {
    return {};
  }
  const counts: Record<string, number> = {};
  for (const [key, count] of Object.entries(value)) {
    if (typeof count === 'number') {
      counts[key] = count;
    }
  }
  return counts;
}

export const llmIssueMetadataShape: JsonShape<LlmIssueMetadata> = (value) => {
  if (!isRecord(value)) {
    return null;
  }
  return {
    code_owners: asStringArray(value.code_owners),
    active_contributors: asStringArray(value.active_contributors),
    affected_services: asStringArray(value.affected_services),
    common_technologies: asStringArray(value.common_technologies),
    issue_labels: countRecord(value.issue_labels),
    common_issue_themes: asStringArray(value.common_issue_themes),
  };
};

export function emptyPatterns(): IssuePatterns {
  return {
    common_bug_areas: [],
    frequent_feature_requests: [],
    pain_points: [],
    improvement_opportunities: [],
  };
}

/**
 * Metadata built from label and contributor counts alone
 */
export function fallbackLlmMetadata(issues: Issue[], prs: PullRequest[]): LlmIssueMetadata {
  const authors: string[] = [];
  for (const issue of issues) {
    if (issue.author) authors.push(issue.author);
  }
  return {
    code_owners: [...new Set(authors.slice(0, 10))],
    active_contributors: topContributors(issues, prs, 15).map(([user]) => user),
    affected_services: [],
    common_technologies: [],
    issue_labels: Object.fromEntries(countLabels(issues)),
    common_issue_themes: [],
  };
}

// ============================================
// Analyzer
// ============================================

export class IssuesAnalyzer {
  private progress: ProgressReporter;
  private llmInsights: boolean;

  constructor(
    private readonly github: GitHubTools,
    private readonly generator: TextGenerator,
    private readonly repository: RepositoryRef,
    options: IssuesAnalyzerOptions = {}
  ) {
    this.progress = options.progress ?? silentProgress;
    this.llmInsights = options.llmInsights ?? false;
  }

  /**
   * Analyze repository issues and pull requests; never rejects
   */
  async analyze(): Promise<IssuesAnalyzerResult> {
    const { owner, name } = this.repository;
    this.progress.step(`🐛 Analyzing Issues: ${owner}/${name}`);

    this.progress.step('📋 Step 1: Fetching open issues...');
    const openIssues = parseIssues(
      await this.github.listIssues(owner, name, { state: 'open', perPage: FETCH_LIMITS.openIssues })
    );
    this.progress.info(`✅ Found ${openIssues.length} open issues`);

    this.progress.step('📋 Step 2: Fetching closed issues...');
    const closedIssues = parseIssues(
      await this.github.listIssues(owner, name, { state: 'closed', perPage: FETCH_LIMITS.closedIssues })
    );
    this.progress.info(`✅ Found ${closedIssues.length} closed issues`);

    this.progress.step('📋 Step 3: Fetching all issues (open + closed)...');
    const allIssues = parseIssues(
      await this.github.listIssues(owner, name, { state: 'all', perPage: FETCH_LIMITS.allIssues })
    );
    this.progress.info(`✅ Found ${allIssues.length} total issues`);

    this.progress.step('🔀 Step 4: Fetching pull requests...');
    const prs = parsePullRequests(
      await this.github.listPullRequests(owner, name, { state: 'open', perPage: FETCH_LIMITS.pullRequests })
    );
    this.progress.info(`✅ Found ${prs.length} open PRs`);

    this.progress.step('📊 Step 5: Extracting issue metadata...');
    const metadata = extractDirectMetadata(allIssues, prs);

    this.progress.step('📈 Step 6: Calculating statistics...');
    const statistics = calculateStatistics(allIssues, prs);

    this.progress.step('🔍 Step 7: Analyzing insights...');
    const insights = extractInsights(allIssues, prs, metadata);

    const result: IssuesAnalyzerResult = {
      summary: {
        total_issues: allIssues.length,
        total_open_issues: openIssues.length,
        total_closed_issues: closedIssues.length,
        total_prs: prs.length,
        open_prs: prs.filter((pr) => pr.state === 'open').length,
        merged_prs: prs.filter((pr) => pr.merged_at !== null).length,
      },
      metadata,
      statistics,
      insights,
      recent_issues: allIssues.slice(0, RECENT_ITEMS),
      recent_prs: prs.slice(0, RECENT_ITEMS),
    };

    if (this.llmInsights) {
      this.progress.step('🤖 Step 8: Running LLM issue insights...');
      result.llm_insights = await this.collectLlmInsights(openIssues, closedIssues, allIssues, prs, metadata);
    }

    this.progress.step('✅ Issues analysis complete!');
    this.progress.info(`Total Issues: ${allIssues.length}`);
    this.progress.info(`Open Issues: ${openIssues.length}`);
    this.progress.info(`Closed Issues: ${closedIssues.length}`);
    this.progress.info(`Pull Requests: ${prs.length}`);

    return result;
  }

  /**
   * Fetch and normalize a single issue; null when it cannot be read
   */
  async getIssue(issueNumber: number): Promise<Issue | null> {
    return parseIssue(await this.github.getIssue(this.repository.owner, this.repository.name, issueNumber));
  }

  private async collectLlmInsights(
    openIssues: Issue[],
    closedIssues: Issue[],
    allIssues: Issue[],
    prs: PullRequest[],
    metadata: DirectMetadata
  ): Promise<LlmIssueInsights> {
    const categories = await this.categorizeIssues(openIssues, closedIssues);
    const patterns = await this.identifyPatterns(categories, metadata);
    const llmMetadata = await this.extractLlmMetadata(allIssues, prs);
    return { categories, patterns, metadata: llmMetadata };
  }

  /**
   * Categorize open issues and up to 20 closed ones; falls back to labels
   */
  async categorizeIssues(openIssues: Issue[], closedIssues: Issue[]): Promise<CategorizedIssues> {
    const issues = [...openIssues, ...closedIssues.slice(0, 20)];

    const prompt = `Categorize these GitHub issues into: bugs, features, enhancements, documentation, questions, other.

Issues:
${truncateText(JSON.stringify(issues, null, 2), 4000)}

Return JSON:
{
  "bugs": [{"number": 123, "title": "...", "priority": "high|medium|low"}],
  "features": [{"number": 124, "title": "...", "status": "proposed|in-progress"}],
  "enhancements": [{"number": 125, "title": "..."}],
  "documentation": [{"number": 126, "title": "..."}],
  "questions": [{"number": 127, "title": "..."}],
  "other": [{"number": 128, "title": "..."}]
}`;

    const categories = await generateStructured(this.generator, {
      systemPrompt: 'You are an issue triage expert. Return only valid JSON.',
      prompt,
      shape: categorizedIssuesShape,
      purpose: 'issue categorization',
    }, log);
    return categories ?? categorizeByLabels(issues);
  }

  /**
   * Identify recurring themes across categorized issues
   */
  async identifyPatterns(categories: CategorizedIssues, metadata: DirectMetadata): Promise<IssuePatterns> {
    const prompt = `Analyze these categorized issues to identify patterns:

Categorized Issues:
${truncateText(JSON.stringify(categories, null, 2), 3000)}

Metadata:
${JSON.stringify(metadata, null, 2)}

Identify patterns and return JSON:
{
  "common_bug_areas": ["area1", "area2"],
  "frequent_feature_requests": ["feature type 1", "feature type 2"],
  "pain_points": ["pain point 1", "pain point 2"],
  "improvement_opportunities": ["opportunity 1", "opportunity 2"]
}`;

    const patterns = await generateStructured(this.generator, {
      systemPrompt: 'You are a pattern analysis expert. Return only valid JSON.',
      prompt,
      shape: issuePatternsShape,
      purpose: 'pattern identification',
    }, log);
    return patterns ?? emptyPatterns();
  }

  /**
   * Ask the model for owners, services and themes behind the issues
   */
  async extractLlmMetadata(issues: Issue[], prs: PullRequest[]): Promise<LlmIssueMetadata> {
    const labelCounts = Object.fromEntries(countLabels(issues));
    const contributors = Object.fromEntries(topContributors(issues, prs, 15));

    const prompt = `Extract metadata from these issues and PRs:

Issues (sample):
${JSON.stringify(issues.slice(0, 20), null, 2)}

Pull Requests (sample):
${JSON.stringify(prs.slice(0, 15), null, 2)}

Label Distribution:
${JSON.stringify(labelCounts, null, 2)}

Top Contributors:
${JSON.stringify(contributors, null, 2)}

Extract and return JSON:
{
  "code_owners": ["username1", "username2"],
  "active_contributors": ["user1", "user2", "user3"],
  "affected_services": ["Service1", "Service2"],
  "common_technologies": ["tech1", "tech2"],
  "issue_labels": {"label1": 3, "label2": 1},
  "common_issue_themes": ["theme1", "theme2"]
}`;

    const extracted = await generateStructured(this.generator, {
      systemPrompt: 'You are a metadata extraction expert. Return only valid JSON.',
      prompt,
      shape: llmIssueMetadataShape,
      purpose: 'metadata extraction',
    }, log);
    return extracted ?? fallbackLlmMetadata(issues, prs);
  }
}
