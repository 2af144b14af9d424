import { HistoryError } from '../../../lib/api/errors'
import { NullCompute } from '../../compute/nullCompute'
import { JobStatus } from '../../models/status'
import { TEST_USER, createSweep, fixedRandom } from '../../../tests/mocks/historyMocks'
import { NullStorage } from '../nullStorage'

describe('NullStorage', () => {
  let storage: NullStorage

  beforeEach(() => {
    storage = new NullStorage(TEST_USER)
  })

  it('cannot be queried', () => {
    expect(storage.collection()).toBeUndefined()
  })

  it('keeps entities as a graph', async () => {
    const { containerSpec, experiment, jobs } = await createSweep(storage)

    expect(jobs.map((job) => job.name)).toEqual(['mnist-0', 'mnist-1', 'mnist-2', 'mnist-3'])
    expect((await experiment.xgroup())?.name).toBe('sweep-group')
    expect((await experiment.containerSpec())?.id).toBe(containerSpec.id)
    expect((await jobs[2].experiment())?.id).toBe(experiment.id)
  })

  it('dedups content-addressed entities', async () => {
    const first = await createSweep(storage)
    const second = await createSweep(storage)

    expect(second.experiment).toBe(first.experiment)
    expect(second.containerSpec).toBe(first.containerSpec)
    expect(await second.experiment.jobs()).toHaveLength(4)
  })

  it('records runs of submitted jobs', async () => {
    const { jobs } = await createSweep(storage)
    const compute = new NullCompute(fixedRandom(JobStatus.SUCCEEDED))

    const run = await jobs[0].submit(compute)
    expect(run?.status).toBe(JobStatus.SUBMITTED)
    expect(run?.platformJobName()).toBe('test-mnist-0')

    await run?.updateStatus(JobStatus.SUCCEEDED)
    expect((await jobs[0].latestRun())?.status).toBe(JobStatus.SUCCEEDED)
  })

  it('refuses status updates of foreign runs', async () => {
    await expect(storage.saveRunStatus('missing')).rejects.toThrow(HistoryError)
  })

  it('forgets everything on close', async () => {
    const { experiment } = await createSweep(storage)
    await storage.close()

    expect(await storage.fetch('experiments', experiment.id)).toBeUndefined()
  })
})
