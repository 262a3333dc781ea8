import type { IdGenerator } from "../id-generator"

export function describeIdGeneratorContract<T extends string>(
  name: string,
  createGenerator: () => IdGenerator<T>,
) {
  describe(`IdGenerator contract: ${name}`, () => {
    let generator: IdGenerator<T>

    beforeEach(() => {
      generator = createGenerator()
    })

    it("generates non-empty strings", () => {
      const id = generator.generate()

      expect(typeof id).toBe("string")
      expect(id.length).toBeGreaterThan(0)
    })

    it("generates unique values", () => {
      const ids = new Set(Array.from({ length: 1000 }, () => generator.generate()))

      expect(ids.size).toBe(1000)
    })
  })
}
