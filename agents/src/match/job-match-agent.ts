/**
 * Job Match Agent - runs the whole tailoring pipeline for one job
 *
 * extract keywords -> parse requirements -> score match ->
 * pick positions, bullets and skills -> report keyword coverage
 *
 * LLM Usage: None (pure code logic)
 */

import {
  KEYWORD_GROUPS,
  getEngineConfig,
  type EngineConfig,
  type KeywordGroups,
} from '@tailorkit/core';
import { BaseAgent } from '../shared/base-agent.js';
import type { AgentConfig, AgentContext } from '../shared/types.js';
import { extractKeywords } from '../extract/keyword-extractor.js';
import { parseJobDescription } from '../extract/requirement-parser.js';
import { createMatchScorer } from '../rank/match-scorer.js';
import { selectBullets, selectSkills } from '../rank/bullet-ranker.js';
import {
  calculatePositionRelevance,
  filterExperienceByDate,
  filterRelevantPositions,
} from '../rank/position-filter.js';
import { analyzeCoverage } from '../review/coverage-reporter.js';
import {
  JobMatchInputSchema,
  JobMatchOutputSchema,
  type JobMatchInput,
  type JobMatchOutput,
  type TailoredPosition,
} from './types.js';

type PipelineDefaults = Pick<
  EngineConfig,
  'keywordLimit' | 'minTokenLength' | 'maxBullets' | 'maxSkills' | 'minPositions'
>;

/** Text the renderer would produce from the selection, for coverage checks. */
export function renderSelectionText(
  positions: readonly TailoredPosition[],
  skills: readonly string[],
): string {
  const lines: string[] = [];
  for (const position of positions) {
    lines.push(`${position.title}, ${position.company}`);
    lines.push(...position.bullets);
  }
  if (skills.length > 0) lines.push(skills.join(', '));
  return lines.join('\n');
}

/**
 * Synchronous pipeline. Options left unset on the input fall back to
 * `defaults` (the engine config).
 */
export function runMatchPipeline(
  input: JobMatchInput,
  defaults: PipelineDefaults,
  groups: KeywordGroups = KEYWORD_GROUPS,
): JobMatchOutput {
  const options = {
    keywordLimit: input.options.keywordLimit ?? defaults.keywordLimit,
    minTokenLength: input.options.minTokenLength ?? defaults.minTokenLength,
    maxBullets: input.options.maxBullets ?? defaults.maxBullets,
    maxSkills: input.options.maxSkills ?? defaults.maxSkills,
    minPositions: input.options.minPositions ?? defaults.minPositions,
    maxYears: input.options.maxYears,
    currentYear: input.options.currentYear,
  };

  const keywords = extractKeywords(input.job.jdText, options.keywordLimit, {
    minLength: options.minTokenLength,
  });
  const requirement = parseJobDescription(input.job, groups);
  const match = createMatchScorer(groups).computeMatch(requirement, input.candidate);

  const recent =
    options.maxYears !== undefined
      ? filterExperienceByDate(input.experience, options.maxYears, options.currentYear)
      : input.experience;
  const positions = filterRelevantPositions(recent, keywords, options.minPositions).map(
    (entry) => ({
      ...entry,
      bullets: selectBullets(entry.bullets, keywords, options.maxBullets),
      relevance: calculatePositionRelevance(entry, keywords),
    }),
  );

  const skillPool = [
    ...input.candidate.skills,
    ...input.candidate.technologies,
    ...input.candidate.methodologies,
  ];
  const skills = selectSkills(skillPool, keywords, options.maxSkills);

  const coverage = analyzeCoverage(renderSelectionText(positions, skills), keywords);

  return { requirement, keywords, match, skills, positions, coverage };
}

export class JobMatchAgent extends BaseAgent<JobMatchInput, JobMatchOutput> {
  config: AgentConfig = {
    name: 'JobMatchAgent',
    description: 'Scores a candidate against a job and selects the resume content to render',
    version: '1.0.0',
  };

  inputSchema = JobMatchInputSchema;
  outputSchema = JobMatchOutputSchema;

  constructor(private readonly groups: KeywordGroups = KEYWORD_GROUPS) {
    super();
  }

  protected async run(input: JobMatchInput, _context: AgentContext): Promise<JobMatchOutput> {
    const defaults = getEngineConfig();
    this.info('Tailoring for job', { company: input.job.company, role: input.job.role });

    const result = runMatchPipeline(input, defaults, this.groups);

    this.debug('Keywords extracted', { count: result.keywords.length });
    this.info('Match scored', { overall: result.match.overall, gaps: result.match.gaps.length });
    this.debug('Content selected', {
      positions: result.positions.length,
      skills: result.skills.length,
    });
    if (result.coverage.missing.length > 0) {
      this.warn('Keywords missing from selected content', { missing: result.coverage.missing });
    }
    this.info('Coverage analysed', { keywordCoveragePct: result.coverage.keywordCoveragePct });

    return result;
  }
}

export const jobMatchAgent = new JobMatchAgent();
