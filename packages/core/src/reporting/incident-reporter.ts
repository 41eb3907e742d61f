/**
 * Incident Reporter
 * Renders a Markdown report for every handled issue and keeps the most
 * recent incidents in memory
 */

import {
  AGENT_VERSION,
  createChildLogger,
  issueContainer,
  type ActionResult,
  type Analysis,
  type Incident,
  type Issue,
} from '@kubemend/shared';

export interface IncidentReporterConfig {
  /** Oldest incidents are evicted beyond this many */
  maxIncidents: number;
  /** Clock used for report timestamps */
  now?: () => Date;
}

function orNA(value: string | undefined): string {
  return value === undefined || value === '' ? 'N/A' : value;
}

/**
 * Fixed-layout Markdown report for one incident
 */
export function renderIncidentReport(
  issue: Issue,
  analysis: Analysis,
  result: ActionResult,
  generatedAt: Date
): string {
  const timestamp = generatedAt.toISOString();

  return `# Incident Report
**Generated:** ${timestamp}
**Agent Version:** ${AGENT_VERSION}

## Issue Detected
- **Type:** ${issue.type}
- **Severity:** ${issue.severity}
- **Resource:** ${issue.pod}
- **Namespace:** ${issue.namespace}
- **Container:** ${orNA(issueContainer(issue))}
- **Detected At:** ${issue.detectedAt.toISOString()}

## AI Analysis
- **Root Cause:** ${orNA(analysis.rootCause)}
- **Risk Level:** ${orNA(analysis.riskLevel)}
- **Explanation:** ${orNA(analysis.explanation)}

## Action Taken
\`\`\`json
${JSON.stringify(result, null, 2)}
\`\`\`

## Resolution Status
**Result:** ${result.success ? 'Successful' : 'Failed'}
**Dry Run:** ${result.dryRun ? 'Yes' : 'No'}
`;
}

export class IncidentReporter {
  private logger = createChildLogger({ component: 'IncidentReporter' });
  private incidents: Incident[] = [];
  private maxIncidents: number;
  private now: () => Date;

  constructor(config: IncidentReporterConfig) {
    this.maxIncidents = config.maxIncidents;
    this.now = config.now ?? (() => new Date());
  }

  /**
   * Render the report, record the incident and return the report text
   */
  report(issue: Issue, analysis: Analysis, result: ActionResult): string {
    const timestamp = this.now();
    const report = renderIncidentReport(issue, analysis, result, timestamp);

    this.incidents.push({ timestamp, issue, analysis, result, report });
    if (this.incidents.length > this.maxIncidents) {
      this.incidents.splice(0, this.incidents.length - this.maxIncidents);
    }

    this.logger.info(
      { pod: issue.pod, namespace: issue.namespace, issueType: issue.type, success: result.success },
      'Incident recorded'
    );

    return report;
  }

  /**
   * Retained incidents, oldest first
   */
  getIncidents(): readonly Incident[] {
    return this.incidents;
  }
}
