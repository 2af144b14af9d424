import { HistoryError, QueryError } from '../../../lib/api/errors'
import { TEST_USER, createSweep } from '../../../tests/mocks/historyMocks'
import { findExperimentGroup, recentJobs, selectJobs } from '../history'
import { MemoryStorage } from '../memoryStorage'
import { NullStorage } from '../nullStorage'

describe('history selection', () => {
  it('selects every job of a group', async () => {
    const storage = new MemoryStorage(TEST_USER)
    await createSweep(storage, [0, 1], 'first')
    await createSweep(storage, [2, 3, 4], 'second')

    const jobs = await selectJobs(storage, { xgroup: 'second' })

    expect(jobs.map((job) => job.kwargs.a)).toEqual([2, 3, 4])
  })

  it('limits the most recent jobs of the user', async () => {
    const storage = new MemoryStorage(TEST_USER)
    await createSweep(storage, [0, 1, 2, 3, 4])

    expect(await selectJobs(storage, { maxJobs: 3 })).toHaveLength(3)
    expect(await recentJobs(storage, 10, 'other-user')).toEqual([])
  })

  it('finds groups by name and user only', async () => {
    const storage = new MemoryStorage(TEST_USER)
    await createSweep(storage, [0], 'mine')

    expect((await findExperimentGroup(storage, 'mine')).user).toBe(TEST_USER)
    await expect(findExperimentGroup(storage, 'mine', 'other-user')).rejects.toThrow(
      new HistoryError("experiment group 'mine' of user other-user not found")
    )
  })

  it('cannot select from the null store', async () => {
    await expect(selectJobs(new NullStorage(TEST_USER), {})).rejects.toThrow(
      new QueryError('the null store cannot be queried')
    )
  })
})
