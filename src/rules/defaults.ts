/**
 * Built-in rule buckets written when no rule document exists yet
 */

import type { RuleBuckets } from '../types/index.js';

export function defaultRuleBuckets(): RuleBuckets {
  return {
    common: [
      {
        id: 'common-1',
        name: 'Hard-coded secret',
        pattern: 'password|secret|token|api_key|apikey',
        description: 'Possible hard-coded secret or credential',
        severity: 'high',
        languages: [],
        source: 'builtin',
        recommendation: 'Load secrets from the environment or a secret store',
        metadata: {},
      },
      {
        id: 'common-2',
        name: 'Potential SQL injection',
        pattern: 'execute|query|select.*from.*where',
        description: 'Possible SQL injection through dynamically built queries',
        severity: 'critical',
        languages: [],
        source: 'builtin',
        recommendation: 'Use parameterized queries',
        metadata: {},
      },
      {
        id: 'common-3',
        name: 'Unhandled exception',
        pattern: 'try|catch|except',
        description: 'Exception handling that may swallow errors',
        severity: 'medium',
        languages: [],
        source: 'builtin',
        metadata: {},
      },
    ],
    python: [
      {
        id: 'python-1',
        name: 'Unsafe pickle use',
        pattern: 'pickle\\.loads|pickle\\.load',
        description: 'Unpickling untrusted data can execute arbitrary code',
        severity: 'high',
        languages: ['python'],
        source: 'builtin',
        metadata: {},
      },
      {
        id: 'python-2',
        name: 'Command injection',
        pattern: 'os\\.system|subprocess\\.call|eval\\(',
        description: 'Possible command injection',
        severity: 'critical',
        languages: ['python'],
        source: 'builtin',
        metadata: {},
      },
    ],
    javascript: [
      {
        id: 'javascript-1',
        name: 'Unsafe eval',
        pattern: 'eval\\(|setTimeout\\(.*\\)|setInterval\\(.*\\)',
        description: 'Dynamic code evaluation',
        severity: 'high',
        languages: ['javascript'],
        source: 'builtin',
        metadata: {},
      },
      {
        id: 'javascript-2',
        name: 'Cross-site scripting',
        pattern: 'innerHTML|document\\.write|\\$\\(.*\\)\\.html\\(',
        description: 'Possible XSS through raw HTML injection',
        severity: 'critical',
        languages: ['javascript'],
        source: 'builtin',
        metadata: {},
      },
    ],
    java: [
      {
        id: 'java-1',
        name: 'Unsafe deserialization',
        pattern: 'ObjectInputStream|readObject',
        description: 'Deserializing untrusted data',
        severity: 'high',
        languages: ['java'],
        source: 'builtin',
        metadata: {},
      },
    ],
  };
}
