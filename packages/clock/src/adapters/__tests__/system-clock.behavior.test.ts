import { SystemClock } from "../system-clock"

describe("SystemClock behavior", () => {
  it("resolves after the delay elapses", async () => {
    const clock = new SystemClock()
    const start = Date.now()

    await clock.sleep(30)

    expect(Date.now() - start).toBeGreaterThanOrEqual(25)
  })

  it("clears its timer when aborted", async () => {
    const clearTimeoutSpy = vi.spyOn(globalThis, "clearTimeout")
    const ac = new AbortController()

    const pending = new SystemClock().sleep(5000, ac.signal)
    ac.abort()
    await pending

    expect(clearTimeoutSpy).toHaveBeenCalled()
  })

  it("removes its abort listener after a normal wake-up", async () => {
    const ac = new AbortController()
    const removeSpy = vi.spyOn(ac.signal, "removeEventListener")

    await new SystemClock().sleep(5, ac.signal)

    expect(removeSpy).toHaveBeenCalledWith("abort", expect.any(Function))
  })
})
