/**
 * The nine score components.
 *
 * Each rule is a pure function of the configuration snapshot and/or the
 * traffic statistics and returns a score in [0, 100] together with the
 * recommendations it raised.
 */

import {
  ALLOWED_HOURS_MIN_REQUESTS,
  BACKEND_SSL_WEIGHT,
  BUSINESS_HOURS,
  CLIENT_SSL_WEIGHT,
  CONCENTRATED_HOURS_MAX,
  ERROR_RATE_STEPS,
  HIGH_TRAFFIC_PER_HOUR,
  IP_WHITELIST_MAX_ACTORS,
  LOGGING_NAMED_KEYWORDS,
  LOGGING_PENALTY_STEPS,
  QUOTA_BASELINE_SCORE,
  QUOTA_VOLUME_THRESHOLD,
  SEVERE_SPIKE_RATIO,
  SPIKE_RATIO,
  SSL_NAMED_ENDPOINTS,
  THROTTLE_HEADROOM,
  type ThresholdStep,
} from "../calibration.js";
import { round2 } from "../math.js";
import {
  ALLOWED_HOURS_KINDS,
  IP_WHITELIST_KINDS,
  QUOTA_KINDS,
  THROTTLING_KINDS,
  authenticationStrength,
  hasEnabledPolicy,
} from "../policies.js";
import type { ConfigurationSnapshot, Recommendation, Severity, SslCoverage } from "../schemas.js";
import type { TrafficStats } from "../types.js";

export interface ComponentResult {
  score: number;
  recommendations: Recommendation[];
}

function pass(score = 100): ComponentResult {
  return { score, recommendations: [] };
}

function firstStepAbove(value: number, steps: readonly ThresholdStep[]): ThresholdStep | undefined {
  return steps.find((s) => value > s.above);
}

// ---------------------------------------------------------------------------
// Configuration-driven components
// ---------------------------------------------------------------------------

export function scoreIpWhitelist(config: ConfigurationSnapshot, stats: TrafficStats): ComponentResult {
  if (hasEnabledPolicy(config, IP_WHITELIST_KINDS)) return pass();

  const recommendations: Recommendation[] = [];
  const ips = stats.uniqueIps;
  if (ips > 0 && ips <= IP_WHITELIST_MAX_ACTORS) {
    recommendations.push({
      severity: "medium",
      category: "ip_whitelist",
      message: `API has ${ips} unique IPs but no IP whitelist configured. Consider adding IP whitelist policy.`,
      action: "Add PolicyIpWhite to restrict access to known IPs",
    });
  }
  return { score: 0, recommendations };
}

export function scoreThrottling(config: ConfigurationSnapshot, stats: TrafficStats): ComponentResult {
  if (hasEnabledPolicy(config, THROTTLING_KINDS)) return pass();

  const max = stats.maxRequestsPerHour;
  const suggested = Math.trunc(max * THROTTLE_HEADROOM);
  const recommendations: Recommendation[] = [];
  if (max > HIGH_TRAFFIC_PER_HOUR) {
    recommendations.push({
      severity: "high",
      category: "throttling",
      message: `High traffic API (${max} req/hour) without throttling. Risk of abuse.`,
      action: `Add throttling policy with limit ~${suggested} req/hour`,
    });
  } else if (max > 0) {
    recommendations.push({
      severity: "low",
      category: "throttling",
      message: "No throttling policy configured.",
      action: `Consider adding throttling policy with limit ~${suggested} req/hour`,
    });
  }
  return { score: 0, recommendations };
}

export function scoreQuota(config: ConfigurationSnapshot, stats: TrafficStats): ComponentResult {
  if (hasEnabledPolicy(config, QUOTA_KINDS)) return pass();

  const recommendations: Recommendation[] = [];
  if (stats.totalRequests > QUOTA_VOLUME_THRESHOLD) {
    recommendations.push({
      severity: "medium",
      category: "quota",
      message: "High-volume API without quota limits.",
      action: "Consider adding quota policy for cost control and fair usage",
    });
  }
  return { score: QUOTA_BASELINE_SCORE, recommendations };
}

/** Fixed strength ranking by policy class; traffic plays no part. */
export function scoreAuthentication(config: ConfigurationSnapshot): ComponentResult {
  switch (authenticationStrength(config)) {
    case "strong":
      return pass();
    case "standard":
      return pass(75);
    case "basic":
      return {
        score: 50,
        recommendations: [
          {
            severity: "medium",
            category: "authentication",
            message: "Using Basic Auth. Consider upgrading to OAuth2 or JWT.",
            action: "Upgrade to stronger authentication method",
          },
        ],
      };
    case "none":
      return {
        score: 0,
        recommendations: [
          {
            severity: "critical",
            category: "authentication",
            message: "No authentication policy configured. API is publicly accessible.",
            action: "Add authentication policy (OAuth2, JWT, or API Key recommended)",
          },
        ],
      };
  }
}

function hh(hour: number): string {
  return `${String(hour).padStart(2, "0")}:00`;
}

/**
 * Suggests a time window when traffic clusters in a few hours. Only the top
 * peak hours are known here, so flat traffic can still look concentrated.
 */
export function scoreAllowedHours(config: ConfigurationSnapshot, stats: TrafficStats): ComponentResult {
  if (hasEnabledPolicy(config, ALLOWED_HOURS_KINDS)) return pass();

  const peaks = [...stats.peakHours].sort((a, b) => a - b);
  if (stats.totalRequests < ALLOWED_HOURS_MIN_REQUESTS || peaks.length === 0) return pass();

  const listed = peaks.map(hh).join(", ");
  const window = `${hh(peaks[0])}-${hh(peaks[peaks.length - 1] + 1)}`;
  const action = `Add PolicyAllowedHours to restrict access to ${window}`;

  if (peaks.every((h) => h >= BUSINESS_HOURS.first && h <= BUSINESS_HOURS.last)) {
    return {
      score: 70,
      recommendations: [
        {
          severity: "low",
          category: "allowed_hours",
          message: `API traffic is concentrated in business hours (peak: ${listed}). Consider restricting access to business hours only.`,
          action,
        },
      ],
    };
  }

  if (peaks.length <= CONCENTRATED_HOURS_MAX) {
    return {
      score: 75,
      recommendations: [
        {
          severity: "low",
          category: "allowed_hours",
          message: `API traffic is concentrated in specific hours (peak: ${listed}). Consider time-based access restriction.`,
          action,
        },
      ],
    };
  }

  return pass();
}

function sslPercent(c: SslCoverage): number {
  return c.total > 0 ? (c.sslCount / c.total) * 100 : 100;
}

function offendingNames(c: SslCoverage): string {
  if (c.nonSslList.length === 0) return `${c.total - c.sslCount} of ${c.total} endpoints`;
  return c.nonSslList.slice(0, SSL_NAMED_ENDPOINTS).map((e) => e.name).join(", ");
}

export function scoreSslTls(config: ConfigurationSnapshot): ComponentResult {
  const client = sslPercent(config.clientSsl);
  const backend = sslPercent(config.backendSsl);
  const recommendations: Recommendation[] = [];

  if (client < 100) {
    recommendations.push({
      severity: "high",
      category: "ssl_tls",
      message: `Client connections without SSL/TLS detected in: ${offendingNames(config.clientSsl)}`,
      action: "Enable HTTPS for all client-facing endpoints to encrypt data in transit",
    });
  }
  if (backend < 100) {
    recommendations.push({
      severity: "medium",
      category: "ssl_tls",
      message: `Backend connections without SSL/TLS: ${offendingNames(config.backendSsl)}`,
      action: "Use HTTPS for backend service connections to ensure end-to-end encryption",
    });
  }

  return {
    score: round2(client * CLIENT_SSL_WEIGHT + backend * BACKEND_SSL_WEIGHT),
    recommendations,
  };
}

// ---------------------------------------------------------------------------
// Traffic-driven components
// ---------------------------------------------------------------------------

export function scoreTrafficAnomaly(stats: TrafficStats): ComponentResult {
  if (stats.avgRequestsPerHour <= 0) return pass();

  const ratio = stats.maxRequestsPerHour / stats.avgRequestsPerHour;
  if (ratio > SEVERE_SPIKE_RATIO) {
    return {
      score: 50,
      recommendations: [
        {
          severity: "high",
          category: "anomaly",
          message: `Severe traffic spike detected (${ratio.toFixed(1)}x average). Possible attack or misconfiguration.`,
          action: "Investigate traffic patterns and consider adding rate limiting",
        },
      ],
    };
  }
  if (ratio > SPIKE_RATIO) {
    return {
      score: 70,
      recommendations: [
        {
          severity: "medium",
          category: "anomaly",
          message: `Significant traffic spike detected (${ratio.toFixed(1)}x average).`,
          action: "Monitor traffic patterns and ensure adequate throttling",
        },
      ],
    };
  }
  return pass();
}

const ERROR_RATE_TEXT: Record<Severity, { message: string; action: string }> = {
  critical: {
    message: "Very high error rate (%s%). Service may be failing.",
    action: "Investigate backend service health and error causes",
  },
  high: {
    message: "High error rate (%s%).",
    action: "Review error logs and improve error handling",
  },
  medium: {
    message: "Elevated error rate (%s%).",
    action: "Monitor error trends and investigate common failures",
  },
  low: {
    message: "Error rate (%s%).",
    action: "Monitor error trends",
  },
};

export function scoreErrorRate(stats: TrafficStats): ComponentResult {
  const step = firstStepAbove(stats.errorRate, ERROR_RATE_STEPS);
  if (!step) return pass();

  const text = ERROR_RATE_TEXT[step.severity];
  return {
    score: step.score,
    recommendations: [
      {
        severity: step.severity,
        category: "errors",
        message: text.message.replace("%s", stats.errorRate.toFixed(1)),
        action: text.action,
      },
    ],
  };
}

/** Penalised by the single most widespread keyword, not by their sum. */
export function scoreLogging(stats: TrafficStats): ComponentResult {
  const exposure = stats.sensitiveData;
  if (!exposure?.hasSensitiveData) return pass();

  const found = Object.entries(exposure.sensitiveKeywords).filter(([, info]) => info.percentage > 0);
  if (found.length === 0) return pass();

  const maxPercentage = Math.max(...found.map(([, info]) => info.percentage));
  const step = firstStepAbove(maxPercentage, LOGGING_PENALTY_STEPS);
  if (!step) return pass();

  const named = found
    .slice(0, LOGGING_NAMED_KEYWORDS)
    .map(([kw, info]) => `${kw} (${info.percentage.toFixed(1)}%)`)
    .join(", ");

  return {
    score: step.score,
    recommendations: [
      {
        severity: step.severity,
        category: "logging",
        message: `Sensitive data detected in logs: ${named}. Checked ${exposure.totalLogsChecked} logs.`,
        action:
          "Configure log masking/filtering to prevent sensitive data (national IDs, phone numbers, passwords, etc.) from being logged",
      },
    ],
  };
}
