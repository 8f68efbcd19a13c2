/**
 * `voicekit rules` — print the local heuristic rule table.
 */

import { Command } from 'commander';
import { DEFAULT_RULES, NEGATION_MARKERS } from '../../resolver/heuristics.js';

export function createRulesCommand(): Command {
  const cmd = new Command('rules');

  cmd
    .description('Show the keyword rules tried before the remote fallback')
    .option('--json', 'Output as JSON')
    .action((options: { json?: boolean }) => {
      if (options.json) {
        console.log(JSON.stringify({ rules: DEFAULT_RULES, negationMarkers: NEGATION_MARKERS }, null, 2));
        return;
      }
      DEFAULT_RULES.forEach((rule, index) => {
        console.log(`${index + 1}. ${rule.action.padEnd(8)} ${rule.keywords.join(', ')}  (negated: ${rule.negated})`);
      });
      console.log(`\nNegation markers: ${NEGATION_MARKERS.join(', ')}`);
    });

  return cmd;
}
