import type { ClassifiedJob, JobLevel } from '../types/job';
import { escapeHtml, truncateText } from '../utils/text';

const LEVEL_EMOJI: Record<JobLevel, string> = {
  Junior: '🟢',
  Middle: '🟡',
  Senior: '🔴',
  Unknown: '⚪',
};

const MONTHS = ['Jan', 'Feb', 'Mar', 'Apr', 'May', 'Jun', 'Jul', 'Aug', 'Sep', 'Oct', 'Nov', 'Dec'];

export const DESCRIPTION_MAX_LENGTH = 350;
export const MAX_SKILLS = 5;

export function formatPostedDate(date: Date | undefined): string {
  if (!date) return 'Recently';
  return `${date.getUTCDate()} ${MONTHS[date.getUTCMonth()]} ${date.getUTCFullYear()}`;
}

function compareIgnoringCase(a: string, b: string): number {
  const left = a.toLowerCase();
  const right = b.toLowerCase();
  if (left < right) return -1;
  if (left > right) return 1;
  return 0;
}

/**
 * Provider tags merged with detected tech stack, sorted, first five
 */
export function collectSkills({ job, classification }: ClassifiedJob): string[] {
  const seen = new Set<string>();
  const skills: string[] = [];

  for (const skill of [...job.skills, ...classification.techStack]) {
    const key = skill.toLowerCase();
    if (seen.has(key)) continue;
    seen.add(key);
    skills.push(skill);
  }

  return skills.sort(compareIgnoringCase).slice(0, MAX_SKILLS);
}

/**
 * Formats a classified job as a Telegram HTML message
 */
export function formatJobMessage(classified: ClassifiedJob): string {
  const { job, classification } = classified;
  const level = classification.level;
  const description = truncateText(job.description, DESCRIPTION_MAX_LENGTH);
  const skills = collectSkills(classified);

  const lines = [
    `${LEVEL_EMOJI[level]} <b>${escapeHtml(job.title)}</b>`,
    '',
    `🏢 <b>Company:</b> ${escapeHtml(job.company)}`,
    `📍 <b>Location:</b> ${escapeHtml(job.location)}`,
    `💵 <b>Salary:</b> ${escapeHtml(job.salary ?? 'Not specified')}`,
    `🎯 <b>Level:</b> ${level === 'Unknown' ? 'Unspecified' : level}`,
    `📅 <b>Posted:</b> ${formatPostedDate(job.postedAt)}`,
  ];

  if (job.employmentType) {
    lines.push(`⏰ <b>Employment:</b> ${escapeHtml(job.employmentType)}`);
  }

  lines.push(
    '',
    '📋 <b>Description:</b>',
    description ? escapeHtml(description) : 'No description provided',
    '',
    '🛠 <b>Skills:</b>'
  );

  if (skills.length > 0) {
    lines.push(...skills.map(skill => `  • ${escapeHtml(skill)}`));
  } else {
    lines.push('  Not specified');
  }

  lines.push(
    '',
    `🔗 <a href="${escapeHtml(job.url)}">Apply for this job</a>`,
    `📌 Source: ${escapeHtml(job.sourceName)}`
  );

  return lines.join('\n');
}
