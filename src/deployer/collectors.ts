/**
 * CloudFormation failure signal collector
 *
 * Reads the most recent stack events after a failed creation and keeps
 * the ones that explain the failure.
 */

import {
  CloudFormationClient,
  DescribeStackEventsCommand,
  StackEvent,
} from '@aws-sdk/client-cloudformation';
import { StackFailureSignal } from './types';

export const DEFAULT_MAX_EVENTS = 50;

export function isFailureStatus(status: string): boolean {
  return status.endsWith('_FAILED') || status.includes('ROLLBACK');
}

/**
 * Filters stack events down to failure signals.
 *
 * The service lists events newest first; signals are returned oldest
 * first so the root cause leads.
 */
export function extractFailureSignals(
  events: StackEvent[],
  maxEvents: number = DEFAULT_MAX_EVENTS
): StackFailureSignal[] {
  const signals: StackFailureSignal[] = [];

  for (const event of events.slice(0, maxEvents)) {
    const status = event.ResourceStatus || '';
    if (!isFailureStatus(status) || !event.ResourceStatusReason) {
      continue;
    }

    signals.push({
      logicalId: event.LogicalResourceId || 'Unknown',
      resourceType: event.ResourceType || 'Unknown',
      resourceStatus: status,
      statusReason: event.ResourceStatusReason,
      timestamp: event.Timestamp || new Date(),
      physicalResourceId: event.PhysicalResourceId,
    });
  }

  return signals.reverse();
}

/**
 * Collects failure signals from CloudFormation stack events
 */
export async function collectStackFailureSignals(
  client: CloudFormationClient,
  stackName: string,
  maxEvents: number = DEFAULT_MAX_EVENTS
): Promise<StackFailureSignal[]> {
  const response = await client.send(
    new DescribeStackEventsCommand({
      StackName: stackName,
    })
  );

  return extractFailureSignals(response.StackEvents || [], maxEvents);
}
