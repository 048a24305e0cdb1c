export type ParsedRemote = {
  host: string;
  path: string;
};

export function parseRemote(remote: string): ParsedRemote {
  const trimmed = remote.trim();
  if (!trimmed) throw new Error("Remote URL is empty");

  const isWindowsDrive = /^[A-Za-z]:[/\\]/.test(trimmed);
  const isUnc = /^\\\\/.test(trimmed);
  const isPosixAbs = /^\//.test(trimmed);
  if (!trimmed.includes("://") && (isWindowsDrive || isUnc || isPosixAbs)) {
    throw new Error(`Local path is not a git remote: ${trimmed}`);
  }

  if (!trimmed.includes("://")) {
    const sshMatch = /^(?:[^@]+@)?([^:]+):(.+)$/.exec(trimmed);
    if (sshMatch) {
      return {
        host: sshMatch[1],
        path: sshMatch[2].replace(/^\/+/, ""),
      };
    }
  }

  let url: URL;
  try {
    url = new URL(trimmed);
  } catch {
    throw new Error(`Unable to parse git remote: ${trimmed}`);
  }
  if (!url.host) throw new Error(`Remote has no host: ${trimmed}`);
  return {
    host: url.host,
    path: url.pathname.replace(/^\/+/, ""),
  };
}

/**
 * Rewrites SSH-style remotes (`git@host:owner/repo.git`, `ssh://git@host/owner/repo.git`)
 * to their HTTPS form. HTTP(S) remotes are returned as they are.
 */
export function toHttpsRemote(remote: string): string {
  const trimmed = remote.trim();
  if (/^https?:\/\//i.test(trimmed)) return trimmed;

  if (/^(ssh|git|git\+ssh):\/\//i.test(trimmed)) {
    const parsed = parseRemote(trimmed);
    // ssh ports do not carry over to https
    const host = parsed.host.replace(/:\d+$/, "");
    return `https://${host}/${parsed.path}`;
  }

  if (trimmed.includes("://")) {
    throw new Error(`Unsupported remote protocol: ${trimmed}`);
  }
  const parsed = parseRemote(trimmed);
  return `https://${parsed.host}/${parsed.path}`;
}

export function withTokenCredential(httpsRemote: string, username: string, token: string) {
  const url = new URL(httpsRemote);
  url.username = username;
  url.password = token;
  return url.toString();
}

export function buildPushUrl(remote: string, username: string, token: string) {
  return withTokenCredential(toHttpsRemote(remote), username, token);
}

export function maskRemote(remote: string) {
  try {
    const url = new URL(remote);
    url.username = "";
    url.password = "";
    return `${url.protocol}//${url.host}${url.pathname}${url.search}`;
  } catch {
    return remote;
  }
}

export function redactSecret(text: string, secret: string | undefined, mask = "***") {
  if (!secret) return text;
  let out = text.split(secret).join(mask);
  const encoded = encodeURIComponent(secret);
  if (encoded !== secret) out = out.split(encoded).join(mask);
  return out;
}
