import { HttpResponse, http } from 'msw'
import { JobStatus, Platform } from '../../models/status'
import { MemoryStorage } from '../../storage/memoryStorage'
import { TEST_USER, createSweep } from '../../../tests/mocks/historyMocks'
import { server } from '../../../tests/msw/server'
import { CaipAPI } from '../../services/caip'
import { CaipCompute, caipJobId, caipStateToStatus } from '../caipCompute'
import { createPlatformRegistry } from '../computePlatform'
import { updateJobStatus } from '../reconcile'

const CAIP_URL = 'https://ml.googleapis.com/v1/projects/test-project/jobs'

beforeAll(() => server.listen())
afterEach(() => {
  server.resetHandlers()
  jest.restoreAllMocks()
})
afterAll(() => server.close())

describe('caipStateToStatus', () => {
  it.each([
    ['QUEUED', JobStatus.SUBMITTED],
    ['PREPARING', JobStatus.SUBMITTED],
    ['RUNNING', JobStatus.RUNNING],
    ['CANCELLING', JobStatus.RUNNING],
    ['SUCCEEDED', JobStatus.SUCCEEDED],
    ['FAILED', JobStatus.FAILED],
    ['CANCELLED', JobStatus.STOPPED],
    ['STATE_UNSPECIFIED', JobStatus.UNKNOWN],
    ['EXPLODED', JobStatus.UNKNOWN],
  ])('%s => %s', (state, status) => {
    expect(caipStateToStatus(state)).toBe(status)
  })
})

describe('caipJobId', () => {
  it('builds a valid, timestamped job id', () => {
    const id = caipJobId('mnist-0', new Date(2020, 4, 1, 9, 4, 3))
    expect(id).toMatch(/^mnist_0_20200501_090403_[0-9a-f]{6}$/)
  })

  it('starts with a letter', () => {
    expect(caipJobId('0-sweep', new Date(2020, 4, 1, 9, 4, 3))).toMatch(/^job_0_sweep_20200501_/)
  })
})

describe('CaipCompute', () => {
  const requests: unknown[] = []
  let compute: CaipCompute

  beforeEach(() => {
    requests.length = 0
    compute = new CaipCompute({
      projectId: 'test-project',
      api: new CaipAPI({ accessToken: 'test-secret' }),
      retry: { attempts: 2, delayMs: 0 },
      buildSpec: (job) => ({
        trainingInput: {
          region: 'us-central1',
          masterConfig: { imageUri: 'gcr.io/test/image:1' },
          args: job.argv(),
        },
      }),
    })
    server.use(
      http.post(CAIP_URL, async ({ request }) => {
        const body: unknown = await request.json()
        requests.push(body)
        const jobId = typeof body === 'object' && body !== null && 'jobId' in body ? body.jobId : ''
        return HttpResponse.json({ jobId, state: 'QUEUED' })
      }),
      http.get(`${CAIP_URL}/:jobId`, ({ params }) =>
        HttpResponse.json({ jobId: params.jobId, state: 'RUNNING' })
      ),
      http.post(`${CAIP_URL}/:action`, ({ params }) => {
        requests.push(params.action)
        return HttpResponse.json({})
      })
    )
  })

  it('submits a training job and records its id', async () => {
    const storage = new MemoryStorage(TEST_USER)
    const { jobs } = await createSweep(storage, [5])

    const run = await jobs[0].submit(compute)

    expect(run?.platform).toBe(Platform.CAIP)
    expect(run?.status).toBe(JobStatus.SUBMITTED)
    expect(run?.details.projectId).toBe('test-project')
    expect(run?.platformJobName()).toMatch(/^mnist_0_\d{8}_\d{6}_[0-9a-f]{6}$/)
    expect(requests).toHaveLength(1)
    expect(requests[0]).toMatchObject({
      jobId: run?.platformJobName(),
      trainingInput: { args: ['--epochs', '2', '--a', '5', '--b', 'run-5'] },
    })
  })

  it('polls and cancels by job id', async () => {
    const storage = new MemoryStorage(TEST_USER)
    const { jobs } = await createSweep(storage, [5])
    const run = await jobs[0].submit(compute)
    if (run === undefined) throw new Error('run expected')

    expect(await compute.status(run)).toBe(JobStatus.RUNNING)
    expect(await compute.stop(run)).toBe(true)
    expect(requests[requests.length - 1]).toBe(`${run.platformJobName()}:cancel`)
  })

  it('records a FAILED run when the API rejects the job', async () => {
    jest.spyOn(console, 'error').mockImplementation(() => {})
    server.use(
      http.post(CAIP_URL, () =>
        HttpResponse.json(
          { error: { code: 400, status: 'INVALID_ARGUMENT', message: 'bad region' } },
          { status: 400 }
        )
      )
    )
    const storage = new MemoryStorage(TEST_USER)
    const { jobs } = await createSweep(storage, [5])

    const run = await jobs[0].submit(compute)

    expect(run?.status).toBe(JobStatus.FAILED)
    expect(run?.details).toEqual({ error: 'bad region' })
  })

  it('retries a status poll the service could not answer', async () => {
    jest.spyOn(console, 'error').mockImplementation(() => {})
    const storage = new MemoryStorage(TEST_USER)
    const { jobs } = await createSweep(storage, [5])
    const run = await jobs[0].submit(compute)
    if (run === undefined) throw new Error('run expected')
    let polls = 0
    server.use(
      http.get(`${CAIP_URL}/:jobId`, () => {
        polls += 1
        return HttpResponse.json(
          { error: { code: 503, status: 'UNAVAILABLE', message: 'try again later' } },
          { status: 503 }
        )
      }, { once: true })
    )

    expect(await updateJobStatus(run, createPlatformRegistry(compute))).toBe(JobStatus.RUNNING)
    expect(polls).toBe(1)
    expect(run.status).toBe(JobStatus.RUNNING)
  })

  it('reports UNKNOWN once the retries run out', async () => {
    jest.spyOn(console, 'error').mockImplementation(() => {})
    const storage = new MemoryStorage(TEST_USER)
    const { jobs } = await createSweep(storage, [5])
    const run = await jobs[0].submit(compute)
    if (run === undefined) throw new Error('run expected')
    let polls = 0
    server.use(
      http.get(`${CAIP_URL}/:jobId`, () => {
        polls += 1
        return HttpResponse.json(
          { error: { code: 503, status: 'UNAVAILABLE', message: 'try again later' } },
          { status: 503 }
        )
      })
    )

    expect(await updateJobStatus(run, createPlatformRegistry(compute))).toBe(JobStatus.UNKNOWN)
    expect(polls).toBe(2)
    expect(run.status).toBe(JobStatus.SUBMITTED)
  })
})
