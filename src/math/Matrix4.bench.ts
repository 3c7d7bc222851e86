import { bench, describe } from 'vitest'
import { Matrix4 } from './Matrix4.ts'
import { PackedMatrix4 } from './PackedMatrix4.ts'

// Six-matrix chain: the shape of a typical scene-graph transform stack
describe('multiplyAll', () => {
  const a = Matrix4.buildRotation(0.1)
  const b = Matrix4.buildTranslation(10, 20)
  const c = Matrix4.buildRotation(-0.05)

  const pa = PackedMatrix4.buildRotation(0.1)
  const pb = PackedMatrix4.buildTranslation(10, 20)
  const pc = PackedMatrix4.buildRotation(-0.05)

  bench('structured', () => {
    Matrix4.multiplyAll([a, b, c, a, b, c])
  })

  bench('packed', () => {
    PackedMatrix4.multiplyAll([pa, pb, pc, pa, pb, pc])
  })
})

describe('invert', () => {
  const m = Matrix4.buildRotateAround(0.3, [4, 5, 6], 'y')
  const packed = PackedMatrix4.buildRotateAround(0.3, [4, 5, 6], 'y')

  bench('structured', () => {
    Matrix4.invert(m)
  })

  bench('packed', () => {
    PackedMatrix4.invert(packed)
  })
})
