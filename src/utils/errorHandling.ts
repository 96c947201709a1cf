/**
 * Error utilities for better error handling and debugging
 */

export interface ErrorDetails {
  message: string;
  stack?: string;
  name?: string;
  code?: string;
  status?: number;
  details?: unknown;
  timestamp: string;
}

/**
 * Serialize an error object to a plain object with all relevant details
 */
export function serializeError(error: unknown): ErrorDetails {
  const timestamp = new Date().toISOString();
  if (error instanceof Error) {
    const details: ErrorDetails = {
      message: error.message,
      name: error.name,
      timestamp,
    };

    if (error.stack) {
      details.stack = error.stack;
    }

    const code: unknown = Reflect.get(error, 'code');
    if (code !== undefined) {
      details.code = String(code);
    }

    const status: unknown = Reflect.get(error, 'status');
    if (typeof status === 'number' || typeof status === 'string') {
      details.status = Number(status);
    }

    // Include additional own properties that might be on the error object
    const additionalProps: Record<string, unknown> = {};
    for (const key of Object.getOwnPropertyNames(error)) {
      if (['message', 'name', 'stack'].includes(key)) continue;
      const value: unknown = Reflect.get(error, key);
      if (typeof value !== 'function' && typeof value !== 'symbol') {
        additionalProps[key] = value;
      }
    }

    if (Object.keys(additionalProps).length > 0) {
      details.details = additionalProps;
    }

    return details;
  }

  return {
    message: String(error),
    name: 'UnknownError',
    timestamp,
    details: {
      originalType: typeof error,
      originalValue: error,
    },
  };
}

/**
 * Create a Google Cloud Storage specific error report
 */
export function handleGCSError(error: unknown, context: Record<string, unknown> = {}): ErrorDetails {
  const serialized = serializeError(error);

  return {
    ...serialized,
    details: {
      ...(serialized.details && typeof serialized.details === 'object' ? serialized.details : {}),
      context,
      troubleshooting: getGCSTroubleshootingHints(serialized),
    },
  };
}

function getGCSTroubleshootingHints(error: ErrorDetails): string[] {
  const hints: string[] = [];

  if (error.code === '403' || error.message.includes('permission') || error.message.includes('forbidden')) {
    hints.push('Check Google Cloud Storage bucket permissions');
    hints.push('Verify service account has Storage Object Admin role');
  }

  if (error.message.includes('uniform bucket-level access')) {
    hints.push('Bucket uses uniform access; grant allUsers objectViewer on the bucket instead of per-object ACLs');
  }

  if (error.code === '404' || error.message.includes('not found')) {
    hints.push('Verify bucket name is correct');
    hints.push('Check if bucket exists in the specified project');
  }

  if (error.message.includes('quota') || error.message.includes('rate limit')) {
    hints.push('Check Google Cloud Storage quotas and limits');
  }

  if (error.message.includes('network') || error.message.includes('timeout')) {
    hints.push('Check network connectivity');
  }

  if (error.message.includes('authentication')) {
    hints.push('Check Google Cloud credentials configuration');
    hints.push('Verify GOOGLE_APPLICATION_CREDENTIALS or service account key');
  }

  return hints;
}
