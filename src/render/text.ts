import type { DecisionResult } from '../types';

function formatScores(result: DecisionResult): string {
  const entries = Object.entries(result.scores);
  return entries.length ? entries.map(([label, points]) => `${label}=${points}`).join(', ') : '(none)';
}

export function renderText(result: DecisionResult): string {
  const lines: string[] = ['', '=== Recommended Threat Modeling Approach ==='];
  result.recommendations.forEach((rec, i) => lines.push(`- ${rec}: ${result.details[i] ?? ''}`));

  lines.push('', `Top pick: ${result.topPick ?? '(none)'}`);
  if (result.alsoConsider.length) lines.push(`Also consider: ${result.alsoConsider.join(', ')}`);
  lines.push(`Scores: ${formatScores(result)}`);

  lines.push('', 'Rationale:');
  for (const r of result.rationale) lines.push(`* ${r}`);

  lines.push('', 'Answers:');
  for (const [qid, ans] of Object.entries(result.answers)) lines.push(`  ${qid.toUpperCase()}: ${ans}`);

  return lines.join('\n');
}
