import { PlatformConfigProvider } from "@effect/platform"
import { NodeFileSystem, NodeRuntime } from "@effect/platform-node"
import { Effect, Layer } from "effect"
import { main } from "./main.js"

// Values from a local .env file are added to the environment config
const DotEnvLive = PlatformConfigProvider.layerDotEnvAdd(".env").pipe(
  Layer.provide(NodeFileSystem.layer)
)

const program = main.pipe(Effect.provide(DotEnvLive))

NodeRuntime.runMain(program)
