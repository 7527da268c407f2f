const HTTP_URL = /^https?:\/\//i;
const SSH_URL = /^ssh:\/\/(?:[^@/]+@)?([^/:]+)(?::\d+)?\/(.+)$/i;
const SCP_LIKE = /^(?:[^@/]+@)?([^:/]+):(.+)$/;

/**
 * Turn a git remote URL into something a browser can open.
 *   git@github.com:org/repo.git      -> https://github.com/org/repo
 *   ssh://git@host:22/org/repo.git   -> https://host/org/repo
 *   https://github.com/org/repo.git  -> https://github.com/org/repo
 * Anything unrecognised comes back with only the .git suffix removed.
 */
export function toBrowsableUrl(remoteUrl: string): string {
    let url = remoteUrl.trim();
    if (url.endsWith('.git')) {
        url = url.slice(0, -'.git'.length);
    }

    if (HTTP_URL.test(url)) {
        return url;
    }

    const ssh = url.match(SSH_URL);
    if (ssh) {
        return `https://${ssh[1]}/${ssh[2]}`;
    }

    const scp = url.match(SCP_LIKE);
    // single-letter "host" is a Windows drive, not a remote
    if (scp && scp[1].length > 1) {
        return `https://${scp[1]}/${scp[2].replace(/^\/+/, '')}`;
    }

    return url;
}
