import type { Severity } from "../../contracts/types.js";

export interface SecretPattern {
  name: string;
  /** Must carry the `g` flag */
  regex: RegExp;
  severity: Severity;
  confidence: number;
}

function pattern(
  name: string,
  regex: RegExp,
  severity: Severity,
  confidence: number,
): SecretPattern {
  return { name, regex, severity, confidence };
}

/**
 * Named secret patterns. Confidence is fixed per pattern; the guard's
 * threshold decides which of them get redacted.
 */
export const SECRET_PATTERNS: readonly SecretPattern[] = [
  // Cloud providers
  pattern("aws_access_key", /(?<![A-Z0-9])AKIA[0-9A-Z]{16}(?![A-Z0-9])/g, "critical", 0.95),
  pattern("aws_session_token", /aws[_-]?session[_-]?token\s*[=:]\s*['"]?[^\s'"]+/gi, "critical", 0.9),
  pattern("google_api_key", /AIza[0-9A-Za-z_-]{35}/g, "high", 0.95),
  pattern(
    "azure_storage_key",
    /DefaultEndpointsProtocol=https;AccountName=[^;]+;AccountKey=[^;\s]+/gi,
    "critical",
    0.95,
  ),

  // Source hosting
  pattern("github_token", /gh[pousr]_[A-Za-z0-9]{36}/g, "critical", 1),
  pattern("github_fine_grained", /github_pat_[A-Za-z0-9_]{22,}/g, "critical", 1),
  pattern("gitlab_token", /glpat-[A-Za-z0-9_-]{20,}/g, "critical", 1),

  // Chat, payments, mail
  pattern("slack_token", /xox[baprs]-[0-9]{10,13}-[0-9]{10,13}-[A-Za-z0-9]{23,25}/g, "high", 1),
  pattern(
    "slack_webhook",
    /https:\/\/hooks\.slack\.com\/services\/T[A-Za-z0-9_]+\/B[A-Za-z0-9_]+\/[A-Za-z0-9_]+/g,
    "high",
    1,
  ),
  pattern(
    "discord_webhook",
    /https:\/\/discord(?:app)?\.com\/api\/webhooks\/\d+\/[A-Za-z0-9_-]+/g,
    "high",
    1,
  ),
  pattern("stripe_live_key", /(?:sk|rk)_live_[A-Za-z0-9]{24,}/g, "critical", 1),
  pattern("stripe_test_key", /sk_test_[A-Za-z0-9]{24,}/g, "medium", 0.9),
  pattern("sendgrid_api_key", /SG\.[A-Za-z0-9_-]{22}\.[A-Za-z0-9_-]{43}/g, "high", 1),
  pattern("mailgun_api_key", /key-[a-f0-9]{32}/g, "high", 0.9),
  pattern("twilio_account_sid", /AC[a-f0-9]{32}/g, "medium", 0.8),

  // Model providers
  pattern("anthropic_api_key", /sk-ant-[A-Za-z0-9_-]{80,}/g, "critical", 1),
  pattern("openai_api_key", /sk-proj-[A-Za-z0-9_-]{40,}/g, "critical", 1),
  pattern("openai_legacy_key", /sk-[A-Za-z0-9]{20}T3BlbkFJ[A-Za-z0-9]{20}/g, "critical", 1),

  // Package registries
  pattern("npm_token", /\/\/registry\.npmjs\.org\/:_authToken=\S+/g, "high", 1),
  pattern("npm_access_token", /npm_[A-Za-z0-9]{36}/g, "high", 0.95),
  pattern("pypi_token", /pypi-[A-Za-z0-9_-]{100,}/g, "high", 1),

  // Tokens and keys
  pattern("jwt", /eyJ[A-Za-z0-9_-]*\.eyJ[A-Za-z0-9_-]*\.[A-Za-z0-9_-]*/g, "high", 0.85),
  pattern(
    "private_key_block",
    /-----BEGIN (?:RSA |EC |DSA |OPENSSH |PGP |ENCRYPTED )?PRIVATE KEY(?: BLOCK)?-----[\s\S]*?(?:-----END [A-Z ]*PRIVATE KEY(?: BLOCK)?-----|$)/g,
    "critical",
    1,
  ),

  // Connection strings with inline passwords
  pattern(
    "database_url",
    /(?:postgres(?:ql)?|mysql|mongodb(?:\+srv)?|redis|amqps?):\/\/[^:\s/]*:[^@\s]+@[^\s'"]+/gi,
    "critical",
    0.95,
  ),

  // Assignments and headers
  pattern(
    "password_assignment",
    /(?:password|passwd|pwd|secret|token|api[_-]?key|auth[_-]?token|access[_-]?token|credentials?)\s*[=:]\s*['"][^'"\s]{8,}['"]/gi,
    "high",
    0.8,
  ),
  pattern(
    "env_secret",
    /^(?:DB_PASSWORD|DATABASE_URL|SECRET_KEY|API_KEY|AWS_SECRET_ACCESS_KEY|PRIVATE_KEY|JWT_SECRET|SESSION_SECRET|ENCRYPTION_KEY|AUTH_SECRET)\s*=\s*\S.*$/gm,
    "critical",
    0.95,
  ),
  pattern("bearer_token", /\bBearer\s+[A-Za-z0-9._~+/-]{16,}=*/g, "high", 0.75),
  pattern("basic_auth", /\bBasic\s+[A-Za-z0-9+/]{20,}={0,2}/g, "high", 0.9),

  // Informational: worth noting, rarely worth redacting
  pattern("hex_32", /(?<![A-Fa-f0-9])[a-f0-9]{32}(?![A-Fa-f0-9])/g, "informational", 0.3),
  pattern("ipv4_private", /\b(?:10|192\.168|172\.(?:1[6-9]|2\d|3[01]))(?:\.\d{1,3}){2,3}\b/g, "informational", 0.2),
];

/** Exact file names (lowercased) whose content is never read */
export const SENSITIVE_FILENAMES: ReadonlySet<string> = new Set([
  ".env",
  ".env.local",
  ".env.development",
  ".env.production",
  ".env.staging",
  ".env.test",
  "credentials",
  "credentials.json",
  "service-account.json",
  "secrets.yaml",
  "secrets.yml",
  "secrets.json",
  ".npmrc",
  ".pypirc",
  ".netrc",
  ".git-credentials",
  ".dockercfg",
  "id_rsa",
  "id_ed25519",
  "id_ecdsa",
  "id_dsa",
  "htpasswd",
  ".htpasswd",
  "shadow",
  "passwd",
]);

/** Extensions (lowercased, with dot) whose content is never read */
export const SENSITIVE_EXTENSIONS: ReadonlySet<string> = new Set([
  ".pem",
  ".key",
  ".p12",
  ".pfx",
  ".jks",
  ".keystore",
  ".cer",
  ".crt",
  ".asc",
  ".gpg",
]);
