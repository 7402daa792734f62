import type { CompressionMode } from '@casevault/domain';

/**
 * Process-wide settings that admins can change without a restart.
 */
export class RuntimeSettings {
  private compressionMode: CompressionMode;

  constructor(initialCompressionMode: CompressionMode) {
    this.compressionMode = initialCompressionMode;
  }

  getCompressionMode(): CompressionMode {
    return this.compressionMode;
  }

  setCompressionMode(mode: CompressionMode): CompressionMode {
    this.compressionMode = mode;
    return this.compressionMode;
  }
}
