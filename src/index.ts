/**
 * mcq - Library Entry Point
 *
 * The CLI (`mcq`) covers everyday use:
 * ```bash
 * mcq index ./notes.txt                      # Embed a reference corpus
 * mcq ask "Largest planet?" -c Mars Jupiter  # Answer one question
 * mcq eval questions.json --runs 3           # Measure accuracy
 * ```
 *
 * This module exposes the same pieces for programmatic use.
 *
 * @example Answer with your own services
 * ```typescript
 * import { MultipleChoiceAgent } from 'mcq-agent';
 *
 * const agent = new MultipleChoiceAgent({ generation }, { reasoning: 'direct', timeoutMs: 30_000 });
 * const index = await agent.getResponse('Which gas do plants absorb?', ['Oxygen', 'Carbon dioxide']);
 * ```
 *
 * @example Configured agent and evaluation
 * ```typescript
 * import { loadConfig, createAgentFromConfig, loadQuestionSet, evaluate } from 'mcq-agent';
 *
 * const config = loadConfig();
 * const { agent } = await createAgentFromConfig(config);
 * const summary = await evaluate(loadQuestionSet('questions.json'), agent, { runs: 3 });
 * console.log(summary.accuracy.median, summary.passed);
 * ```
 *
 * @packageDocumentation
 */

export * from './agent/index.js';
export * from './eval/index.js';
export * from './search/index.js';
export * from './indexer/index.js';
export * from './providers/index.js';
export * from './errors/index.js';
export * from './config/index.js';
export { safeJsonParse, formatTable, consoleLogger, silentLogger, type Logger } from './utils/index.js';
