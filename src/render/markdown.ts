import type { DecisionResult } from '../types';

// Table cells must not break the row
function cell(value: string): string {
  return value.replace(/\|/g, '\\|');
}

export function renderMarkdown(result: DecisionResult): string {
  const out: string[] = ['# Threat Modeling Recommendation', ''];
  out.push(`**Top pick:** ${result.topPick ?? '_none_'}`, '');

  out.push('## Recommendations', '');
  result.recommendations.forEach((rec, i) => out.push(`- **${rec}**: ${result.details[i] ?? ''}`));
  out.push('');

  if (result.alsoConsider.length) {
    out.push('## Also consider', '');
    for (const label of result.alsoConsider) out.push(`- ${label}`);
    out.push('');
  }

  const scores = Object.entries(result.scores);
  if (scores.length) {
    out.push('## Scores', '', '| Method | Score |', '|---|---|');
    for (const [label, points] of scores) out.push(`| ${cell(label)} | ${points} |`);
    out.push('');
  }

  out.push('## Rationale', '');
  for (const r of result.rationale) out.push(`- ${r}`);
  out.push('');

  out.push('## Answers', '', '| Question | Answer |', '|---|---|');
  for (const [qid, ans] of Object.entries(result.answers)) out.push(`| ${qid.toUpperCase()} | ${ans} |`);

  return out.join('\n') + '\n';
}
