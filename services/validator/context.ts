import { ChainJobDetails } from '../../types/chain';
import { SCORING_RUBRIC } from '../inference/prompts';

/**
 * fixed-template rendering of a retrieved job; the same job always
 * yields the same context
 */
export function buildValidationContext(jobRef: string, job: ChainJobDetails): string {
  return `Job Validation Context:

Job ID: ${jobRef}
Creator: ${job.creator}
Agent ID: ${job.agentId}
Budget: ${job.budget} (in smallest unit)
Description: ${job.description}
State: ${job.state}
Created At: ${job.createdAt} (timestamp)
Accept Deadline: ${job.acceptDeadline} (timestamp)
Complete Deadline: ${job.completeDeadline} (timestamp)
Multihop ID: ${job.multihopId}
Step: ${job.step}

${SCORING_RUBRIC}
`;
}
