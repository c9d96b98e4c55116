export { LocalGitClient, type LocalGitClientOptions } from './local-git-client.js';
