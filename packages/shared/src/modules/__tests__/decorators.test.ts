import { autoRegister, del, get, route } from '../decorators'

describe('route decorators', () => {
  it('leave the decorated method untouched', () => {
    const handler = () => 'ok'
    const descriptor: PropertyDescriptor = { value: handler, writable: true, configurable: true }

    expect(autoRegister('/events')(Object, 'search', descriptor)).toBeUndefined()
    expect(get('/search')(handler, { kind: 'method', name: 'search' })).toBeUndefined()
    expect(descriptor.value).toBe(handler)
  })

  it('exposes delete under the route namespace', () => {
    expect(route.delete).toBe(del)
  })
})
