export { CaipJobState, GkeJobState, JobStatus, Platform } from '../../lib/api/status'
