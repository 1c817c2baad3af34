import { RedactionPattern } from '../types';

/** Returns false to veto a match that is a known false positive. */
export type MatchValidator = (match: string, text: string, start: number, end: number) => boolean;

export const BUILTIN_PATTERNS: RedactionPattern[] = [
  // Connection strings
  {
    name: 'SQLConnectionString',
    pattern: String.raw`(?:Server|Data Source|Initial Catalog|Database)\s*=\s*[^;]+(?:;[^;]*(?:Password|PWD|User ID|UID)\s*=\s*[^;]+)+`,
    description: 'SQL Server connection strings with credentials',
    severity: 'critical'
  },
  {
    name: 'MongoDBConnectionString',
    pattern: String.raw`mongodb(?:\+srv)?://(?:[^:]+:[^@]+@)?[^/\s]+(?:/[^\s]*)?`,
    description: 'MongoDB connection strings',
    severity: 'critical'
  },
  {
    name: 'RedisConnectionString',
    pattern: String.raw`redis://(?:[^:]+:[^@]+@)?[^/\s]+(?::\d+)?(?:/\d+)?`,
    description: 'Redis connection strings',
    severity: 'critical'
  },
  {
    name: 'PostgreSQLConnectionString',
    pattern: String.raw`(?:postgres|postgresql)://(?:[^:]+:[^@]+@)?[^/\s]+(?::\d+)?/[^\s]+`,
    description: 'PostgreSQL connection strings',
    severity: 'critical'
  },
  {
    name: 'MySQLConnectionString',
    pattern: String.raw`mysql://(?:[^:]+:[^@]+@)?[^/\s]+(?::\d+)?/[^\s]+`,
    description: 'MySQL connection strings',
    severity: 'critical'
  },

  // Tokens and keys
  {
    name: 'BearerToken',
    pattern: String.raw`Bearer\s+[A-Za-z0-9\-._~+/]+=*`,
    description: 'Bearer tokens in Authorization headers',
    severity: 'critical'
  },
  {
    name: 'JWTToken',
    pattern: String.raw`eyJ[A-Za-z0-9_-]+\.eyJ[A-Za-z0-9_-]+\.[A-Za-z0-9_-]+`,
    description: 'JWT tokens',
    severity: 'critical'
  },
  {
    name: 'APIKey',
    pattern: String.raw`\b(?:api[_-]?key|apikey|key|token)[\s:=]+["']?([A-Za-z0-9_\-]{20,})["']?`,
    description: 'Generic API keys',
    severity: 'critical'
  },
  {
    name: 'AWSAccessKey',
    pattern: String.raw`\b(AKIA[0-9A-Z]{16})\b`,
    description: 'AWS access key IDs',
    severity: 'critical'
  },
  {
    name: 'AzureConnectionString',
    pattern: String.raw`(?:DefaultEndpointsProtocol|AccountName|AccountKey|EndpointSuffix)\s*=\s*[^;]+(?:;[^;]*){2,}`,
    description: 'Azure storage connection strings',
    severity: 'critical'
  },
  {
    name: 'GenericSecret',
    pattern: String.raw`\b(?:password|passwd|pwd|secret|token|auth)[\s:=]+["']?([^\s"']{8,})["']?`,
    description: 'Generic passwords and secrets',
    severity: 'critical'
  },
  {
    name: 'URLCredentials',
    pattern: String.raw`(?:https?|ftp)://([^:\s]+):([^@\s]+)@`,
    description: 'Credentials embedded in URLs',
    severity: 'critical'
  },

  // Personal data
  {
    name: 'EmailAddress',
    pattern: String.raw`\b[A-Za-z0-9._%+-]+@[A-Za-z0-9.-]+\.[A-Za-z]{2,}\b`,
    description: 'Email addresses',
    severity: 'warning'
  },
  {
    name: 'SSN',
    pattern: String.raw`\b(?!000|666|9\d{2})\d{3}-(?!00)\d{2}-(?!0000)\d{4}\b`,
    description: 'US Social Security Numbers (XXX-XX-XXXX)',
    severity: 'critical'
  },
  {
    name: 'SSNNoHyphens',
    pattern: String.raw`\b(?!000)(?!666)(?!9\d{2})\d{3}(?!00)\d{2}(?!0000)\d{4}\b`,
    description: 'US Social Security Numbers (9 digits)',
    severity: 'critical'
  },
  {
    name: 'PhoneNumberUS',
    pattern: String.raw`\b(?:\+1[-.\s]?)?\(?\d{3}\)?[-.\s]?\d{3}[-.\s]?\d{4}\b`,
    description: 'US phone numbers',
    severity: 'warning'
  },
  {
    name: 'CreditCard',
    pattern: String.raw`\b(?:4\d{15}|5[1-5]\d{14}|3[47]\d{13}|6(?:011|5\d{2})\d{12}|4\d{3}[-\s]\d{4}[-\s]\d{4}[-\s]\d{4}|5[1-5]\d{2}[-\s]\d{4}[-\s]\d{4}[-\s]\d{4}|3[47]\d{2}[-\s]\d{6}[-\s]\d{5}|6(?:011|5\d{2})[-\s]\d{4}[-\s]\d{4}[-\s]\d{4})\b`,
    description: 'Credit card numbers (Visa, MC, Amex, Discover)',
    severity: 'critical'
  },

  // Network and key material
  {
    name: 'PrivateIPv4',
    pattern: String.raw`\b(?:10\.\d{1,3}\.\d{1,3}\.\d{1,3}|172\.(?:1[6-9]|2\d|3[01])\.\d{1,3}\.\d{1,3}|192\.168\.\d{1,3}\.\d{1,3})\b`,
    description: 'Private IPv4 addresses',
    severity: 'info'
  },
  {
    name: 'PrivateKey',
    pattern: String.raw`-----BEGIN (?:RSA |EC |OPENSSH )?PRIVATE KEY-----[\s\S]+?-----END (?:RSA |EC |OPENSSH )?PRIVATE KEY-----`,
    description: 'PEM-encoded private keys',
    severity: 'critical'
  },
  {
    name: 'Certificate',
    pattern: String.raw`-----BEGIN CERTIFICATE-----[\s\S]+?-----END CERTIFICATE-----`,
    description: 'PEM-encoded certificates',
    severity: 'warning'
  },

  // Other
  {
    name: 'WindowsCredential',
    pattern: String.raw`(?:domain|username)\\[^\\]+\\(?:password|pwd):[^\s]+`,
    description: 'Windows domain credentials',
    severity: 'critical'
  },
  {
    name: 'InternalPath',
    pattern: String.raw`(?:[A-Z]:|\\\\[^\\]+)\\(?:Users|Documents|Internal|Confidential|Private)\\[^\s]+`,
    description: 'Internal file paths that may reveal structure',
    severity: 'info'
  },
  {
    name: 'AuthorizationHeader',
    pattern: String.raw`Authorization:\s*(?:Basic|Bearer|Digest)\s+[A-Za-z0-9+/=_-]+`,
    description: 'Authorization HTTP headers',
    severity: 'critical'
  },
  {
    name: 'APIKeyHeader',
    pattern: String.raw`X-API-Key:\s*[A-Za-z0-9_-]{20,}`,
    description: 'X-API-Key HTTP headers',
    severity: 'critical'
  },
  {
    name: 'SessionID',
    pattern: String.raw`\b(?:session|sessionid|jsessionid|phpsessid|sid)[\s:=]+["']?([A-Za-z0-9_-]{20,})["']?`,
    description: 'Session identifiers',
    severity: 'warning'
  }
];

// Words that show up next to addresses, counts and hash codes in debugger output
const TECHNICAL_INDICATORS = [
  'method table', 'mt:', 'mt ', 'address', '0x',
  'hash', 'hashcode', 'count:', 'size:', 'total:',
  'bytes', 'object', 'instance', 'type:', 'class:',
  'heap', 'generation', 'syncblk', 'thread id',
  'handle', 'pointer', 'offset', 'id:', 'tid:'
];

export function isTechnicalContext(text: string, start: number, end: number): boolean {
  const window = text.slice(Math.max(0, start - 100), Math.min(text.length, end + 100)).toLowerCase();
  if (TECHNICAL_INDICATORS.some(indicator => window.includes(indicator))) {
    return true;
  }
  const surrounding = text.slice(Math.max(0, start - 50), Math.min(text.length, end + 50));
  const nineDigitRuns = surrounding.match(/\b\d{9}\b/g) ?? [];
  return nineDigitRuns.length >= 3;
}

export function passesLuhn(candidate: string): boolean {
  const digits = candidate.replace(/\D/g, '');
  if (digits.length < 13) return false;
  let sum = 0;
  let double = false;
  for (let i = digits.length - 1; i >= 0; i--) {
    let d = Number(digits[i]);
    if (double) {
      d *= 2;
      if (d > 9) d -= 9;
    }
    sum += d;
    double = !double;
  }
  return sum % 10 === 0;
}

const notTechnical: MatchValidator = (_match, text, start, end) => !isTechnicalContext(text, start, end);

export const BUILTIN_VALIDATORS: Record<string, MatchValidator> = {
  SSN: notTechnical,
  SSNNoHyphens: notTechnical,
  PhoneNumberUS: notTechnical,
  CreditCard: match => passesLuhn(match)
};

/** Probe strings used to flag custom patterns that would redact almost everything. */
export const BREADTH_PROBES = [
  'normal text without secrets',
  'API_KEY=abc123xyz789',
  'password=secret123',
  'user@example.com',
  'Server=localhost;Database=test;User=admin;Password=pass123'
];
