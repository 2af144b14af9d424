import { ConnectError } from '../../../lib/api/errors'
import { JobStatus } from '../../models/status'
import { NullCompute } from '../../compute/nullCompute'
import { TEST_USER, createSweep, fixedRandom } from '../../../tests/mocks/historyMocks'
import { FirestoreFake, TEST_DATABASE, TEST_PROJECT } from '../../../tests/msw/firestoreHandlers'
import { server } from '../../../tests/msw/server'
import { QueryOp } from '../clause'
import { FirestoreStorage } from '../firestoreStorage'
import { Direction } from '../interfaces'

const RETRY = { attempts: 2, delayMs: 0 }

function openStorage(): Promise<FirestoreStorage> {
  return FirestoreStorage.open({
    projectId: TEST_PROJECT,
    databaseId: TEST_DATABASE,
    accessToken: 'test-secret',
    retry: RETRY,
    user: TEST_USER,
  })
}

beforeAll(() => server.listen())
afterEach(() => {
  server.resetHandlers()
  jest.restoreAllMocks()
})
afterAll(() => server.close())

describe('FirestoreStorage', () => {
  let fake: FirestoreFake

  beforeEach(() => {
    fake = new FirestoreFake()
    server.use(...fake.handlers)
    jest.spyOn(console, 'error').mockImplementation(() => {})
  })

  it('probes the database when opened', async () => {
    const storage = await openStorage()

    expect(storage.kind).toBe('firestore')
    expect(fake.queries).toEqual([
      { structuredQuery: { from: [{ collectionId: 'xgroups' }], limit: 1 } },
    ])
  })

  it('retries transient failures', async () => {
    fake.unavailable = 1

    await openStorage()

    expect(fake.unavailable).toBe(0)
    expect(fake.queries).toHaveLength(1)
  })

  it('rejects with a ConnectError when the database stays unavailable', async () => {
    fake.unavailable = 2

    const opened = openStorage()

    await expect(opened).rejects.toThrow(ConnectError)
    await expect(opened).rejects.toThrow('probe Firestore failed: try again later')
  })

  it('commits a new experiment and its jobs in one write', async () => {
    const storage = await openStorage()
    const { experiment, jobs } = await createSweep(storage)

    expect(fake.commits).toHaveLength(1)
    // group, experiment and four jobs
    expect(fake.commits[0]).toHaveLength(6)
    expect(fake.collection('jobs')).toHaveLength(4)
    expect(jobs.map((job) => job.kwargs.a).sort()).toEqual([0, 1, 2, 3])
    expect(fake.documents.get(`experiments/${experiment.id}`)?.configs).toEqual([
      { a: 0, b: 'run-0' },
      { a: 1, b: 'run-1' },
      { a: 2, b: 'run-2' },
      { a: 3, b: 'run-3' },
    ])
  })

  it('reuses an experiment that already exists', async () => {
    const storage = await openStorage()
    const first = await createSweep(storage)
    const second = await createSweep(storage)

    expect(second.experiment.id).toBe(first.experiment.id)
    expect(fake.collection('experiments')).toHaveLength(1)
    expect(fake.collection('jobs')).toHaveLength(4)
  })

  it('sends the first clause to the index and applies the rest locally', async () => {
    const storage = await openStorage()
    const { experiment } = await createSweep(storage)

    const jobs = await storage
      .collection('jobs')
      .where('experiment', QueryOp.EQ, experiment.id)
      .where('kwargs.a', QueryOp.GE, 2)
      .execute()

    expect([...jobs].map((job) => job.name).sort()).toEqual(['mnist-2', 'mnist-3'])
    expect(fake.queries[fake.queries.length - 1]).toEqual({
      structuredQuery: {
        from: [{ collectionId: 'jobs' }],
        where: {
          fieldFilter: {
            field: { fieldPath: 'experiment' },
            op: 'EQUAL',
            value: { stringValue: experiment.id },
          },
        },
      },
    })
  })

  it('sends order and limit with a single clause', async () => {
    const storage = await openStorage()
    await createSweep(storage)

    const jobs = await storage
      .collection('jobs')
      .where('user', QueryOp.EQ, TEST_USER)
      .orderBy('kwargs.a', Direction.DESCENDING)
      .limit(2)
      .execute()

    expect([...jobs].map((job) => job.name)).toEqual(['mnist-3', 'mnist-2'])
    expect(fake.queries[fake.queries.length - 1]).toEqual({
      structuredQuery: {
        from: [{ collectionId: 'jobs' }],
        where: {
          fieldFilter: {
            field: { fieldPath: 'user' },
            op: 'EQUAL',
            value: { stringValue: TEST_USER },
          },
        },
        orderBy: [{ field: { fieldPath: 'kwargs.a' }, direction: 'DESCENDING' }],
        limit: 2,
      },
    })
  })

  it('orders and limits locally with several clauses', async () => {
    const storage = await openStorage()
    await createSweep(storage)

    const jobs = await storage
      .collection('jobs')
      .where('user', QueryOp.EQ, TEST_USER)
      .where('kwargs.a', QueryOp.LT, 3)
      .orderBy('kwargs.a', Direction.DESCENDING)
      .limit(2)
      .execute()

    expect([...jobs].map((job) => job.name)).toEqual(['mnist-2', 'mnist-1'])
  })

  it('filters the same whatever the clause order', async () => {
    const storage = await openStorage()
    await createSweep(storage, [0, 1, 2, 3, 4])
    const jobs = storage.collection('jobs')

    const forward = await jobs.where('kwargs.a', QueryOp.GE, 1).where('kwargs.a', QueryOp.LT, 4).execute()
    const backward = await jobs.where('kwargs.a', QueryOp.LT, 4).where('kwargs.a', QueryOp.GE, 1).execute()

    const names = (found: Iterable<{ name: string }>) => [...found].map((job) => job.name).sort()
    const forwardNames = names(forward)
    expect(forwardNames).toEqual(['mnist-1', 'mnist-2', 'mnist-3'])
    expect(names(backward)).toEqual(forwardNames)
  })

  it('answers an empty in-list without asking the database', async () => {
    const storage = await openStorage()
    await createSweep(storage)
    const sent = fake.queries.length

    const jobs = await storage.collection('jobs').where('name', QueryOp.IN, []).execute()

    expect([...jobs]).toEqual([])
    expect(fake.queries).toHaveLength(sent)
  })

  it('applies long in-lists locally', async () => {
    const storage = await openStorage()
    await createSweep(storage)
    const names = ['mnist-0', 'mnist-1', ...Array.from({ length: 29 }, (_, index) => `other-${index}`)]

    const jobs = await storage
      .collection('jobs')
      .where('name', QueryOp.IN, names)
      .where('user', QueryOp.EQ, TEST_USER)
      .execute()

    expect([...jobs].map((job) => job.name).sort()).toEqual(['mnist-0', 'mnist-1'])
    expect(fake.queries[fake.queries.length - 1]).toEqual({
      structuredQuery: {
        from: [{ collectionId: 'jobs' }],
        where: {
          fieldFilter: {
            field: { fieldPath: 'user' },
            op: 'EQUAL',
            value: { stringValue: TEST_USER },
          },
        },
      },
    })
  })

  it('updates run status in place', async () => {
    const storage = await openStorage()
    const { jobs } = await createSweep(storage)
    const run = await jobs[0].submit(new NullCompute(fixedRandom(JobStatus.RUNNING)))
    if (run === undefined) throw new Error('run expected')

    await run.updateStatus(JobStatus.RUNNING)

    expect(fake.documents.get(`runs/${run.id}`)?.status).toBe(JobStatus.RUNNING)
    expect((await storage.fetch('runs', run.id))?.status).toBe(JobStatus.RUNNING)
  })

  it('shows buffered writes to reads inside a transaction', async () => {
    const storage = await openStorage()
    const { jobs } = await createSweep(storage)
    const run = await jobs[0].submit(new NullCompute(fixedRandom(JobStatus.RUNNING)))
    if (run === undefined) throw new Error('run expected')

    const seen = await storage.transaction(async () => {
      await storage.getOrCreateExperimentGroup('buffered')
      await storage.getOrCreateExperimentGroup('buffered')
      await run.updateStatus(JobStatus.STOPPED)
      return storage.fetch('runs', run.id)
    })

    expect(seen?.status).toBe(JobStatus.STOPPED)
    expect(fake.commits).toHaveLength(2)
    expect(fake.commits[1]).toHaveLength(2)
    expect(fake.commits[1][1]).toEqual({
      update: {
        name: `projects/${TEST_PROJECT}/databases/${TEST_DATABASE}/documents/runs/${run.id}`,
        fields: { status: { stringValue: JobStatus.STOPPED } },
      },
      updateMask: { fieldPaths: ['status'] },
      currentDocument: { exists: true },
    })
    expect(fake.documents.get(`runs/${run.id}`)?.status).toBe(JobStatus.STOPPED)
  })

  it('sends nothing when a transaction fails', async () => {
    const storage = await openStorage()

    await expect(
      storage.transaction(async () => {
        await storage.getOrCreateExperimentGroup('doomed')
        throw new Error('abort')
      })
    ).rejects.toThrow('abort')

    expect(fake.commits).toEqual([])
    expect(fake.collection('xgroups')).toEqual([])
  })
})
