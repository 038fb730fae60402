import { Console, Effect, Logger, LogLevel } from "effect"
import { UnitConverter } from "../src/Converter.js"

const requests = [
  { value: 100, src: "ft", dest: "m" },
  { value: 1, src: "mi", dest: "km" },
  { value: 100, src: "degC", dest: "degF" },
  { value: 1, src: "psi", dest: "kPa" },
  { value: 1, src: "kW*h", dest: "J" },
  { value: 60, src: "mi/h", dest: "km/h" },
] as const

const program = Effect.gen(function* () {
  const converter = yield* UnitConverter

  for (const { value, src, dest } of requests) {
    const result = yield* converter.convert(value, src, dest)
    yield* Console.log(`${value} ${src} = ${result} ${dest}`)
  }

  const { value, unit } = yield* converter.expand(1, "kW*h")
  yield* Console.log(`1 kW*h expands to ${value} ${unit.format()}`)
}).pipe(Effect.provide(UnitConverter.Default), Logger.withMinimumLogLevel(LogLevel.Debug))

Effect.runPromise(program).catch((error) => {
  console.error("Failed to run conversion example", error)
  process.exitCode = 1
})
