import { describe, it, expect } from 'vitest'
import { assembleArgs, FILTER_SEPARATOR } from '../../../../L0-pure/composition/assembler.js'
import { compileComposition } from '../../../../L0-pure/composition/compiler.js'
import { at, hstack, resource, vstack, zstack } from '../../../../L0-pure/composition/builder.js'

describe('assembleArgs', () => {
  it('emits inputs, the filter graph and the output map in order', () => {
    const graph = compileComposition(zstack(resource('a.mp4'), resource('b.mp4', at(100, 50))))

    expect(assembleArgs(graph)).toEqual([
      '-i', 'a.mp4',
      '-i', 'b.mp4',
      '-filter_complex', '[0][1]overlay=100:50[s0]',
      '-map', '[s0]',
    ])
  })

  it('joins filter expressions with a semicolon', () => {
    const graph = compileComposition(vstack(
      hstack(resource('a'), resource('b')),
      hstack(resource('c'), resource('d')),
    ))

    const args = assembleArgs(graph)

    expect(FILTER_SEPARATOR).toBe(';')
    expect(args.slice(8)).toEqual([
      '-filter_complex', '[0][1]hstack=inputs=2[s0];[2][3]hstack=inputs=2[s1];[s0][s1]vstack=inputs=2[s2]',
      '-map', '[s2]',
    ])
  })

  it('keeps one -i pair per input slot, duplicates included', () => {
    const graph = compileComposition(hstack(resource('a.mp4'), resource('a.mp4')))

    expect(assembleArgs(graph).slice(0, 4)).toEqual(['-i', 'a.mp4', '-i', 'a.mp4'])
  })

  it('adds a null pass-through stage for a bare resource', () => {
    const graph = compileComposition(resource('clip.mp4'))

    expect(assembleArgs(graph)).toEqual([
      '-i', 'clip.mp4',
      '-filter_complex', '[0]null[s0]',
      '-map', '[s0]',
    ])
  })

  it('passes file paths through unescaped', () => {
    const graph = compileComposition(hstack(resource('my clip.mp4'), resource('C:\\media\\b.mov')))

    const args = assembleArgs(graph)

    expect(args[1]).toBe('my clip.mp4')
    expect(args[3]).toBe('C:\\media\\b.mov')
  })

  it('accepts a hand-built graph', () => {
    const args = assembleArgs({ inputs: ['x.mp4', 'y.mp4'], filters: ['[0][1]vstack=inputs=2[s0]'], output: 's0' })

    expect(args).toEqual(['-i', 'x.mp4', '-i', 'y.mp4', '-filter_complex', '[0][1]vstack=inputs=2[s0]', '-map', '[s0]'])
  })
})
