import { shortID } from '../../lib/api/utils'
import { ImageBuilder, ResubmitSummary, resubmit } from '../compute/resubmit'
import { CommandContext } from './context'

export interface ResubmitCommandOptions {
  xgroup?: string
  maxJobs?: number
  user?: string
  allJobs?: boolean
  buildImage?: ImageBuilder
}

export async function resubmitCommand(
  context: CommandContext,
  options: ResubmitCommandOptions = {}
): Promise<ResubmitSummary> {
  const summary = await resubmit(context.storage, context.platforms, {
    ...options,
    maxJobs: options.maxJobs ?? context.config.statusMaxJobs,
    callback: ({ request, run, error }, index, total) => {
      const outcome = error === undefined ? `run ${shortID(run?.id)}` : `failed: ${error}`
      context.print(`[${index + 1}/${total}] job ${shortID(request.job.id)} ${outcome}`)
    },
  })
  const attempted = summary.submitted + summary.failed
  context.print(`resubmitted ${summary.submitted} of ${attempted} jobs, ${summary.skipped} skipped`)
  return summary
}
