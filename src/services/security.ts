export class SecurityService {
  // Telegram bot tokens look like `<bot id>:<secret>`
  private static readonly secretPatterns = [
    /\/bot[^\/\s]+/g,
    /\b\d{5,}:[A-Za-z0-9_-]{20,}\b/g,
    /"botToken":\s*"[^"]*"/g,
    /Bearer\s+[A-Za-z0-9\-_]+/g,
    /token[=:]\s*[A-Za-z0-9\-_]+/gi
  ];

  /**
   * Obfuscate IP address for privacy - show only first and last octet
   */
  static obfuscateIp(ip: string | null): string {
    if (!ip) {
      return 'Unknown';
    }

    // Handle IPv4
    if (ip.includes('.')) {
      const parts = ip.split('.');
      if (parts.length === 4) {
        return `${parts[0]}.xxx.xxx.${parts[3]}`;
      }
    }

    // Handle IPv6 (basic obfuscation)
    if (ip.includes(':')) {
      const parts = ip.split(':');
      if (parts.length >= 2) {
        return `${parts[0]}:xxxx:xxxx:xxxx:xxxx:xxxx:xxxx:${parts[parts.length - 1]}`;
      }
    }

    return 'xxx.xxx.xxx.xxx';
  }

  /**
   * Remove credentials from text bound for logs or error messages
   */
  static redactSecrets(text: string): string {
    let sanitized = text;
    for (const pattern of this.secretPatterns) {
      sanitized = sanitized.replace(pattern, '[REDACTED]');
    }
    return sanitized;
  }

  /**
   * Sanitize error messages returned over HTTP
   */
  static sanitizeErrorMessage(message: string): string {
    const sensitivePatterns = [
      /\/home\/[^\/\s]+/g, // Home directory paths
      /\/var\/[^\/\s]+/g,  // Var directory paths
      /\/tmp\/[^\/\s]+/g,  // Temp directory paths
      /\b\d{1,3}\.\d{1,3}\.\d{1,3}\.\d{1,3}\b/g // IP addresses
    ];

    let sanitized = this.redactSecrets(message);
    for (const pattern of sensitivePatterns) {
      sanitized = sanitized.replace(pattern, '[REDACTED]');
    }

    // Limit message length
    if (sanitized.length > 200) {
      sanitized = sanitized.substring(0, 197) + '...';
    }

    return sanitized;
  }
}
