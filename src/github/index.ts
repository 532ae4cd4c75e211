export * from "./github.types";
export { GithubContentsClient, buildContentsUrl, getGitHubHeaders } from "./github-client";
