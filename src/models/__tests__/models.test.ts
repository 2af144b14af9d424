import { SubmissionError } from '../../../lib/api/errors'
import { NullCompute } from '../../compute/nullCompute'
import { MemoryStorage } from '../../storage/memoryStorage'
import { ScriptedCompute, TEST_USER, createSweep } from '../../../tests/mocks/historyMocks'
import { ContainerSpec, acceleratorLabel } from '../containerSpec'
import { Experiment } from '../experiment'
import { ExperimentGroup } from '../experimentGroup'
import { JobStatus, Platform } from '../status'

describe('ContainerSpec', () => {
  it('shares ids between equal parameters of one user', () => {
    const now = new Date('2024-01-01T00:00:00Z')
    const first = ContainerSpec.createRecord({ buildPath: '/work', extraDirs: ['data'] }, TEST_USER, now)
    const second = ContainerSpec.createRecord(
      { extraDirs: ['data'], buildPath: '/work', imageId: undefined },
      TEST_USER
    )
    const other = ContainerSpec.createRecord({ buildPath: '/work', extraDirs: ['data'] }, 'other-user')

    expect(second.id).toBe(first.id)
    expect(other.id).not.toBe(first.id)
    expect(first.spec).toEqual({ buildPath: '/work', extraDirs: ['data'] })
  })

  it('describes how it is built', () => {
    const record = ContainerSpec.createRecord(
      { buildPath: '/work/project', extraDirs: ['data', 'configs'], accelerator: { kind: 'gpu', type: 'P100', count: 2 } },
      TEST_USER
    )
    const spec = new ContainerSpec(record)

    expect(spec.describe()).toBe(
      `${record.id.slice(0, 8)}: job_mode: GPU 2xP100, build url: /work/project, extra dirs: data,configs`
    )
    expect(new ContainerSpec(ContainerSpec.createRecord({ imageId: 'mnist:1' }, TEST_USER)).describe()).toMatch(
      /: job_mode: CPU, build url: mnist:1, extra dirs: none$/
    )
  })

  it('labels accelerators', () => {
    expect(acceleratorLabel({ kind: 'none' })).toBe('CPU')
    expect(acceleratorLabel({ kind: 'tpu', type: 'V3', count: 8 })).toBe('TPU 8xV3')
  })
})

describe('ExperimentGroup', () => {
  it('generates names from the user and time', () => {
    expect(ExperimentGroup.generateName(TEST_USER, new Date(2020, 4, 1, 9, 4, 3))).toBe(
      'test-user-xgroup-2020-05-01-09-04-03'
    )
  })
})

describe('Experiment', () => {
  it('derives one job record per config', () => {
    const record = Experiment.createRecord({
      name: 'mnist',
      xgroup: 'g1',
      container: 'c1',
      command: null,
      args: ['train'],
      configs: [{ lr: 0.1 }, { lr: 0.2 }],
      user: TEST_USER,
    })

    const jobs = Experiment.jobRecords(record)

    expect(jobs.map((job) => [job.name, job.kwargs])).toEqual([
      ['mnist-0', { lr: 0.1 }],
      ['mnist-1', { lr: 0.2 }],
    ])
    expect(new Set(jobs.map((job) => job.id)).size).toBe(2)
  })
})

describe('Job', () => {
  it('builds its command line', async () => {
    const { jobs } = await createSweep(new MemoryStorage(TEST_USER), [4])

    expect(jobs[0].argv()).toEqual(['--epochs', '2', '--a', '4', '--b', 'run-4'])
    expect(jobs[0].describe()).toBe('--epochs 2 --a 4 --b run-4')
  })
})

describe('Run', () => {
  it('clones as a new run of the same job', async () => {
    const storage = new MemoryStorage(TEST_USER)
    const { jobs } = await createSweep(storage, [4])
    const compute = new ScriptedCompute()
    const original = await jobs[0].submit(compute)
    if (original === undefined) throw new Error('run expected')
    await original.updateStatus(JobStatus.FAILED)
    const before = original.toDict()

    const clone = await original.clone(compute)

    expect(clone?.id).not.toBe(original.id)
    expect(clone?.jobId).toBe(original.jobId)
    expect(clone?.jobSpecId).toBe(original.jobSpecId)
    expect(clone?.status).toBe(JobStatus.SUBMITTED)
    expect(compute.submitted[1].spec).toEqual({ job: 'mnist-0' })
    expect((await storage.fetch('runs', original.id))?.toDict()).toEqual(before)
    expect(await jobs[0].runs()).toHaveLength(2)
  })

  it('refuses to clone onto another platform', async () => {
    const storage = new MemoryStorage(TEST_USER)
    const { jobs } = await createSweep(storage, [4])
    const original = await jobs[0].submit(new ScriptedCompute(Platform.GKE))
    if (original === undefined) throw new Error('run expected')

    await expect(original.clone(new NullCompute())).rejects.toThrow(SubmissionError)
  })

  it('keeps its status when saving fails', async () => {
    const storage = new MemoryStorage(TEST_USER)
    const { jobs } = await createSweep(storage, [4])
    const run = await jobs[0].submit(new ScriptedCompute())
    if (run === undefined) throw new Error('run expected')
    jest.spyOn(storage, 'saveRunStatus').mockRejectedValueOnce(new Error('offline'))

    await expect(run.updateStatus(JobStatus.RUNNING)).rejects.toThrow('offline')
    expect(run.status).toBe(JobStatus.SUBMITTED)
    jest.restoreAllMocks()
  })
})
