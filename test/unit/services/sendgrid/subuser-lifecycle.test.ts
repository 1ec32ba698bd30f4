import {
  type SubuserDesired,
  SubuserLifecycle,
} from '@services/sendgrid/lifecycle/subuser-lifecycle.js'
import type { LifecycleOptions } from '@services/sendgrid/lifecycle/lifecycle-options.js'
import { HttpTransport } from '@services/sendgrid/transport/http-transport.js'
import { SendgridErrorKind } from '@utils/sendgrid-error.js'
import { http } from 'msw'
import { beforeEach, describe, expect, it } from 'vitest'
import { createMockLogger } from '../../../mocks/logger.js'
import {
  createStubTransport,
  respond,
} from '../../../mocks/sendgrid-transport.js'
import {
  fakeSendgrid,
  rateLimited,
  SENDGRID_TEST_BASE_URL,
} from '../../../mocks/sendgrid-api-handlers.js'
import { server } from '../../../setup/msw-setup.js'

const lifecycleOptions: LifecycleOptions = {
  createTimeoutMs: 2000,
  updateTimeoutMs: 2000,
  deleteTimeoutMs: 2000,
  backoff: {
    initialDelayMs: 10,
    maxDelayMs: 40,
    multiplier: 2,
    jitterRatio: 0,
  },
}

const alice: SubuserDesired = {
  username: 'alice',
  email: 'alice@example.com',
  password: 'test-password',
  ips: ['10.0.0.1'],
}

describe('SubuserLifecycle', () => {
  let log: ReturnType<typeof createMockLogger>
  let lifecycle: SubuserLifecycle

  function createLifecycle(options: LifecycleOptions = lifecycleOptions) {
    return new SubuserLifecycle(
      new HttpTransport(
        {
          baseUrl: SENDGRID_TEST_BASE_URL,
          apiKey: 'test-secret',
          timeoutMs: 1000,
        },
        log,
      ),
      options,
      log,
    )
  }

  beforeEach(() => {
    log = createMockLogger()
    lifecycle = createLifecycle()
  })

  it('should converge through create, update and delete', async () => {
    const created = await lifecycle.create(alice)

    expect(created).toEqual({
      username: 'alice',
      email: 'alice@example.com',
      password: 'test-password',
      ips: ['10.0.0.1'],
      disabled: false,
      userId: 1001,
      creditAllocationType: 'unlimited',
    })
    expect(fakeSendgrid.calls).toEqual([
      'POST /subusers',
      'GET /subusers?username=alice',
    ])
    expect(fakeSendgrid.requests[0]?.body).toEqual({
      username: 'alice',
      email: 'alice@example.com',
      password: 'test-password',
      ips: ['10.0.0.1'],
    })

    const read = await lifecycle.read('alice', created)
    expect(read).toEqual({ status: 'present', state: created })

    const updated = await lifecycle.update('alice', created, {
      ...alice,
      disabled: true,
    })
    expect(updated).toEqual({ ...created, disabled: true })
    expect(fakeSendgrid.subusers.get('alice')?.disabled).toBe(true)

    await expect(lifecycle.delete('alice')).resolves.toBe('deleted')
    await expect(lifecycle.read('alice', updated)).resolves.toEqual({
      status: 'gone',
      id: 'alice',
    })
  })

  it('should apply disabled right after creating', async () => {
    const created = await lifecycle.create({ ...alice, disabled: true })

    expect(created.disabled).toBe(true)
    expect(fakeSendgrid.calls).toEqual([
      'POST /subusers',
      'PATCH /subusers/alice',
      'GET /subusers?username=alice',
    ])
  })

  it('should only read back when nothing changed', async () => {
    const created = await lifecycle.create(alice)
    fakeSendgrid.requests.length = 0

    const updated = await lifecycle.update('alice', created, alice)

    expect(updated).toEqual(created)
    expect(fakeSendgrid.calls).toEqual(['GET /subusers?username=alice'])
  })

  it('should replace IPs with a single scoped write', async () => {
    const created = await lifecycle.create(alice)
    fakeSendgrid.requests.length = 0

    const updated = await lifecycle.update('alice', created, {
      ...alice,
      ips: ['10.0.0.1', '10.0.0.2'],
    })

    expect(updated.ips).toEqual(['10.0.0.1', '10.0.0.2'])
    expect(fakeSendgrid.calls).toEqual([
      'PUT /subusers/alice/ips',
      'GET /subusers?username=alice',
    ])
  })

  it('should read back once after writing several fields', async () => {
    const created = await lifecycle.create(alice)
    fakeSendgrid.requests.length = 0

    const updated = await lifecycle.update('alice', created, {
      ...alice,
      ips: ['10.0.0.2'],
      disabled: true,
    })

    expect(updated).toEqual({ ...created, ips: ['10.0.0.2'], disabled: true })
    expect(fakeSendgrid.calls).toEqual([
      'PATCH /subusers/alice',
      'PUT /subusers/alice/ips',
      'GET /subusers?username=alice',
    ])
  })

  it('should refuse to change the email in place', async () => {
    const created = await lifecycle.create(alice)
    fakeSendgrid.requests.length = 0

    await expect(
      lifecycle.update('alice', created, {
        ...alice,
        email: 'alice@example.org',
      }),
    ).rejects.toMatchObject({
      kind: SendgridErrorKind.Precondition,
      message:
        'email of alice cannot change in place; the subuser must be replaced',
    })
    expect(fakeSendgrid.calls).toEqual([])
  })

  it('should treat a repeated delete as already absent', async () => {
    fakeSendgrid.seedSubuser({ username: 'alice' })

    await expect(lifecycle.delete('alice')).resolves.toBe('deleted')
    await expect(lifecycle.delete('alice')).resolves.toBe('already-absent')
    expect(log.debug).toHaveBeenCalledWith(
      { username: 'alice' },
      'Subuser was already deleted',
    )
  })

  it('should report a prefix-only match as gone', async () => {
    fakeSendgrid.seedSubuser({ username: 'alice2' })

    await expect(lifecycle.read('alice')).resolves.toEqual({
      status: 'gone',
      id: 'alice',
    })
  })

  it('should import an existing subuser by username', async () => {
    fakeSendgrid.seedSubuser({ username: 'bob', disabled: true })

    const imported = await lifecycle.import('bob')

    expect(imported).toEqual({
      username: 'bob',
      email: 'bob@example.com',
      password: '',
      ips: [],
      disabled: true,
      userId: 1001,
    })
  })

  it('should fail to import a subuser that does not exist', async () => {
    await expect(lifecycle.import('carol')).rejects.toMatchObject({
      kind: SendgridErrorKind.NotFound,
      message: "importing subuser: carol wasn't found",
    })
  })

  it('should retry a rate-limited create', async () => {
    server.use(
      http.post(`${SENDGRID_TEST_BASE_URL}/subusers`, () => rateLimited(), {
        once: true,
      }),
    )

    const created = await lifecycle.create(alice)

    expect(created.userId).toBe(1001)
    expect(log.info).toHaveBeenCalledWith(
      { username: 'alice', userId: 1001, attempts: 2 },
      'Subuser created',
    )
  })

  it('should give up once the create budget is spent', async () => {
    server.use(
      http.post(`${SENDGRID_TEST_BASE_URL}/subusers`, () => rateLimited()),
    )
    const tight = createLifecycle({ ...lifecycleOptions, createTimeoutMs: 50 })

    await expect(tight.create(alice)).rejects.toMatchObject({
      kind: SendgridErrorKind.Timeout,
      statusCode: 429,
    })
    expect(fakeSendgrid.subusers.size).toBe(0)
  })

  it('should not issue anything once cancelled', async () => {
    const controller = new AbortController()
    controller.abort()

    await expect(
      lifecycle.delete('alice', controller.signal),
    ).rejects.toMatchObject({
      kind: SendgridErrorKind.Cancelled,
      message: 'deleting subuser cancelled after 0 attempt(s)',
    })
    expect(fakeSendgrid.calls).toEqual([])
  })

  describe('when a follow-up fails after the subuser was created', () => {
    it('should return the created state instead of failing', async () => {
      const { transport, issueRequest } = createStubTransport(
        respond(201, {
          username: 'alice',
          user_id: 7,
          email: 'alice@example.com',
        }),
        respond(500, { errors: [{ field: null, message: 'internal error' }] }),
      )
      const stubbed = new SubuserLifecycle(transport, lifecycleOptions, log)

      const created = await stubbed.create({ ...alice, disabled: true })

      expect(created).toEqual({
        username: 'alice',
        email: 'alice@example.com',
        password: 'test-password',
        ips: ['10.0.0.1'],
        disabled: false,
        userId: 7,
      })
      expect(issueRequest).toHaveBeenCalledTimes(2)
      expect(issueRequest).toHaveBeenLastCalledWith(
        'PATCH',
        '/subusers/alice',
        { disabled: true },
        undefined,
      )
      expect(log.warn).toHaveBeenCalledWith(
        expect.objectContaining({ username: 'alice' }),
        'Subuser created but the follow-up failed; returning the created state',
      )
    })

    it('should return the created state when the read-back fails', async () => {
      const { transport } = createStubTransport(
        respond(201, {
          username: 'alice',
          user_id: 7,
          email: 'alice@example.com',
        }),
        respond(503, 'upstream unavailable'),
      )
      const stubbed = new SubuserLifecycle(transport, lifecycleOptions, log)

      const created = await stubbed.create(alice)

      expect(created.userId).toBe(7)
      expect(created.username).toBe('alice')
    })
  })
})
