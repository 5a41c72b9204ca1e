import assert from 'node:assert/strict'
import { describe, it } from 'node:test'
import { FixedEstimator, SeededEstimator } from './synthetic-estimator'

describe('SeededEstimator', () => {
  it('should repeat the same draws for the same seed', () => {
    const first = new SeededEstimator(42)
    const second = new SeededEstimator(42)

    const a = Array.from({ length: 5 }, () => first.uniform(0, 1))
    const b = Array.from({ length: 5 }, () => second.uniform(0, 1))

    assert.deepEqual(a, b)
  })

  it('should differ across seeds', () => {
    assert.notEqual(new SeededEstimator(1).uniform(0, 1), new SeededEstimator(2).uniform(0, 1))
  })

  it('should stay inside the requested range', () => {
    const estimator = new SeededEstimator(7)

    for (let i = 0; i < 1_000; i++) {
      const value = estimator.uniform(0.4, 0.7)
      assert.ok(value >= 0.4 && value < 0.7, `draw ${value} out of range`)
    }
  })
})

describe('FixedEstimator', () => {
  it('should answer the midpoint by default', () => {
    const estimator = new FixedEstimator()

    assert.equal(estimator.uniform(0, 2), 1)
    assert.equal(estimator.uniform(0.4, 0.8), 0.6000000000000001)
  })

  it('should cycle through the given fractions', () => {
    const estimator = new FixedEstimator([0, 1])

    assert.deepEqual(
      [estimator.uniform(10, 20), estimator.uniform(10, 20), estimator.uniform(10, 20)],
      [10, 20, 10],
    )
  })

  it('should reject fractions outside [0, 1]', () => {
    assert.throws(() => new FixedEstimator(1.5), /Fractions must be/)
    assert.throws(() => new FixedEstimator([]), /Fractions must be/)
  })
})
