import { NullLogger } from "../null-logger"

describe("NullLogger", () => {
  it("returns itself as child", () => {
    const logger = new NullLogger()

    expect(logger.child({ itemId: "12345" })).toBe(logger)
  })
})
