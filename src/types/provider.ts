/**
 * Analysis provider contract.
 *
 * Providers never throw across this boundary: a call resolves to either the
 * raw response text or a classified ProviderError.
 */

export type ProviderErrorKind = 'auth' | 'timeout' | 'connection' | 'other';

export interface ProviderError {
  kind: ProviderErrorKind;
  message: string;
  /** HTTP status, when the provider answered */
  status?: number;
}

export type AnalysisResult =
  | { success: true; response: string }
  | { success: false; error: ProviderError };

/**
 * A text-completion capability used for semantic analysis.
 */
export interface AnalysisAdapter {
  /** Human-readable provider label, used in logs */
  readonly label: string;
  analyze(prompt: string): Promise<AnalysisResult>;
}
