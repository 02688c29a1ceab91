import type {
  MaybeEmpty,
  PlaylistStats,
  RecentForm,
  StrengthsAndWeaknesses,
  SummaryStats,
} from '@replay-coach/shared';
import { isPopulated } from '../analysis/performanceAnalysis.js';

export const COACH_SYSTEM_PROMPT = [
  'You are an expert Rocket League coach with years of experience.',
  'Provide specific, actionable coaching advice based on player statistics.',
  'Be encouraging but honest. Focus on 3-4 key areas for improvement.',
  'Keep your response concise and well-structured.',
].join(' ');

const MAX_PLAYLISTS_IN_PROMPT = 3;
const MAX_QUICK_TIPS = 5;

export interface CoachingInputs {
  summary: MaybeEmpty<SummaryStats>;
  recentForm: MaybeEmpty<RecentForm>;
  strengths: MaybeEmpty<StrengthsAndWeaknesses>;
  playlists?: Record<string, PlaylistStats>;
}

export function buildCoachingPrompt({ summary, recentForm, strengths, playlists }: CoachingInputs): string {
  const s = isPopulated<SummaryStats>(summary) ? summary : undefined;
  const r = isPopulated<RecentForm>(recentForm) ? recentForm : undefined;
  const sw = isPopulated<StrengthsAndWeaknesses>(strengths) ? strengths : undefined;

  const totalGames = s?.total_games ?? 0;
  const recentGames = r?.games ?? 0;

  const lines: string[] = [
    "Analyze this Rocket League player's performance and provide coaching advice:",
    '',
    `OVERALL STATS (${totalGames} games):`,
    `- Win Rate: ${(s?.win_rate ?? 0).toFixed(1)}%`,
    `- Average Goals: ${(s?.avg_goals ?? 0).toFixed(2)}`,
    `- Average Assists: ${(s?.avg_assists ?? 0).toFixed(2)}`,
    `- Average Saves: ${(s?.avg_saves ?? 0).toFixed(2)}`,
    `- Average Score: ${(s?.avg_score ?? 0).toFixed(0)}`,
    `- Shooting Accuracy: ${(s?.avg_shooting_pct ?? 0).toFixed(1)}%`,
    '',
    `RECENT FORM (Last ${recentGames} games):`,
    `- Wins: ${r?.wins ?? 0}/${recentGames} (${(r?.win_rate ?? 0).toFixed(1)}% win rate)`,
    `- Recent Goals: ${(r?.avg_goals ?? 0).toFixed(2)}`,
    `- Recent Assists: ${(r?.avg_assists ?? 0).toFixed(2)}`,
    `- Recent Saves: ${(r?.avg_saves ?? 0).toFixed(2)}`,
    '',
    'IDENTIFIED PATTERNS:',
    `Strengths: ${(sw?.strengths ?? []).join(', ')}`,
    `Areas to improve: ${(sw?.weaknesses ?? []).join(', ')}`,
  ];

  const playlistEntries = Object.entries(playlists ?? {}).slice(0, MAX_PLAYLISTS_IN_PROMPT);
  if (playlistEntries.length > 0) {
    lines.push('', 'PERFORMANCE BY GAME MODE:');
    for (const [name, stats] of playlistEntries) {
      lines.push(`- ${name}: ${stats.games} games, ${stats.win_rate.toFixed(1)}% win rate`);
    }
  }

  lines.push(
    '',
    'Provide personalized coaching advice:',
    '1. Start with 1-2 positive observations about their playstyle',
    '2. Identify 2-3 key areas for improvement with specific actionable tips',
    '3. Suggest training focus areas or drills',
    '4. End with motivational insight about their trajectory',
    '',
    'Keep it concise, specific, and encouraging.'
  );

  return lines.join('\n');
}

/**
 * Rule-based tips that need no LLM call. At most five, in category order.
 */
export function generateQuickTips(summary: MaybeEmpty<SummaryStats>): string[] {
  if (!isPopulated<SummaryStats>(summary)) return [];

  const tips: string[] = [];

  if (summary.avg_goals < 1.0) tips.push('Work on offensive positioning - look for more scoring opportunities');
  else if (summary.avg_goals > 2.0) tips.push('Excellent goal scoring! Keep applying offensive pressure');

  if (summary.avg_assists < 0.8) tips.push('Practice passing plays - look for teammates in better positions');
  else if (summary.avg_assists > 1.5) tips.push('Great playmaking! Your passing creates opportunities');

  if (summary.avg_saves < 1.0) tips.push('Focus on defensive rotation and positioning');
  else if (summary.avg_saves > 2.0) tips.push("Solid defense! You're keeping your team in games");

  if (summary.avg_shooting_pct < 30) tips.push('Improve shot selection - quality over quantity');
  else if (summary.avg_shooting_pct > 50) tips.push("Excellent shooting accuracy! You're efficient with your shots");

  if (summary.win_rate < 45) tips.push('Focus on consistency - review replays to identify patterns');
  else if (summary.win_rate > 55) tips.push("Great win rate! You're climbing steadily");

  return tips.slice(0, MAX_QUICK_TIPS);
}
