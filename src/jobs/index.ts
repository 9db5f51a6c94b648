import { capJob } from './cap.js';
import { strataJob } from './strata.js';
import { neutrlJob } from './neutrl.js';
import { apyReportJob } from './apy-report.js';
import type { Job } from '../types/job.js';

export const JOBS: readonly Job[] = [capJob, strataJob, neutrlJob, apyReportJob];

export function getJob(name: string): Job | undefined {
  return JOBS.find(job => job.name === name);
}

export { capJob, strataJob, neutrlJob, apyReportJob };
