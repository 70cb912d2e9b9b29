/**
 * Ranks and filters the configured dataset and prints the results.
 *
 * Usage: npm run rank-sample
 */

import { loadConfig } from '../src/config';
import { buildGraph } from '../src/modules/graph-builder';
import { graphStats, verifyGraph } from '../src/modules/graph-core';
import { loadDataset } from '../src/modules/dataset';
import { filterPosts } from '../src/modules/post-filter';
import { RANKING_MODES, rankPosts } from '../src/modules/ranker';
import { graphTitle, wordFrequencies } from '../src/modules/visualization';

function main() {
  const config = loadConfig();
  console.log(`📂 Loading ${config.datasetPath}\n`);

  const graph = buildGraph(loadDataset(config.datasetPath));
  const stats = graphStats(graph);
  console.log(`✓ ${stats.nodeCount} nodes, ${stats.edgeCount} edges`, stats.nodesByKind);

  const violations = verifyGraph(graph);
  if (violations.length > 0) {
    console.error('❌ Invariant violations:', violations);
    process.exit(1);
  }

  const n = Math.max(config.ranking.topN, 3);
  for (const mode of RANKING_MODES) {
    const ranking = rankPosts(graph, mode, { viewsImportance: config.ranking.viewsImportance, n });
    console.log(`\n${graphTitle(ranking.length, mode)}`);
    ranking.forEach(({ postId, score }, i) => console.log(`   ${i + 1}. ${postId} (${score})`));
  }

  const lisbon = filterPosts(graph, { authorFilter: { location: 'Lisbon' } });
  console.log(`\n📝 Posts by Lisbon authors (${lisbon.length}):`);
  lisbon.forEach((content) => console.log(`   - ${content}`));

  const top = Array.from(wordFrequencies(lisbon).entries())
    .filter(([, count]) => count > 1)
    .map(([word, count]) => `${word}×${count}`);
  console.log(`\n☁️  Repeated words: ${top.join(', ') || '(none)'}`);
}

try {
  main();
} catch (e) {
  console.error('❌ Failed:', e);
  process.exit(1);
}
