/**
 * Error types raised by docshift
 * @module errors
 */

/**
 * Raised when the build is configured in a way the pipeline cannot honour,
 * such as an unknown target language or an HTML page without `</head>`.
 * Always fatal for the page being built.
 */
export class ConfigurationError extends Error {
  readonly code = 'DOCSHIFT_CONFIG';

  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}
