import { countWords, readingTimeMinutes } from '../../modules/utils';
import { errorMessage } from '../../modules/errors';
import { InferenceService } from '../inference';
import { ILogger } from '../logger';
import { JobErrorCode, JobOutcome, JobStatus } from '../../types/job';

/**
 * Turns submitted dispute text into a verdict. The text length is
 * checked at submission; every run resolves to exactly one outcome.
 */
class VerifierService {
  inference: InferenceService;
  logger: ILogger;

  constructor(inference: InferenceService, logger: ILogger) {
    this.inference = inference;
    this.logger = logger;
  }

  async run(jobId: string, jobData: string): Promise<JobOutcome> {
    let verdict: string;
    try {
      verdict = await this.inference.summarize(jobData);
    } catch (err) {
      this.logger.error(`verifier-failed ${jobId}: ${errorMessage(err)}`);
      return {
        status: JobStatus.FAILED,
        error: { code: JobErrorCode.INFERENCE_FAILED, message: errorMessage(err) },
      };
    }
    const wordCount = countWords(jobData);
    this.logger.info(`verifier-completed ${jobId} words=${wordCount}`);
    return {
      status: JobStatus.COMPLETED,
      result: {
        verdict,
        word_count: wordCount,
        reading_time: readingTimeMinutes(wordCount),
      },
    };
  }
}

export { VerifierService };
