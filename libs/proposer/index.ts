export type { FetchLike } from './chatCompletionProposer.js';
export { ChatCompletionProposer, buildMessages, extractScript } from './chatCompletionProposer.js';
