/**
 * paddle-duel - simulation core for a two-player paddle-and-bullets match
 * paddle-duel - 双人球拍射击对战的模拟核心
 */

// Core
export { World } from './core/World';
export type { WorldOptions, ResourceKey } from './core/World';
export { EntityManager } from './core/EntityManager';
export { SparseSetStore } from './core/SparseSetStore';
export type { IComponentStore } from './core/SparseSetStore';
export { registerComponent, getComponentType } from './core/ComponentRegistry';
export type { ComponentType } from './core/ComponentRegistry';
export { Query } from './core/Query';
export { CommandBuffer } from './core/CommandBuffer';
export { EntityNotFoundError } from './core/Errors';
export { system, SystemBuilder, STAGE_ORDER } from './core/System';
export type { SystemStage, SystemContext, SystemFn, SystemConfig } from './core/System';
export { Scheduler } from './core/Scheduler';
export { Profiler } from './core/Profiler';
export type { SysStat } from './core/Profiler';
export type { Entity, ComponentCtor, InstancesOf, ReadonlyInstancesOf, DeepReadonly } from './utils/Types';
export { makeEntity, indexOf, genOf } from './utils/Types';

// Math
export * from './math/vec2';
export * from './math/geometry';
export { PRNG } from './determinism/PRNG';

// Components
export { Transform } from './components/Transform';
export { Bounds } from './components/Bounds';
export { Ball } from './components/Ball';
export { Bullet } from './components/Bullet';
export { Controller, WASD, ARROWS } from './components/Controller';
export type { ControlScheme, PlayerControl, AIControl, DirectionBindings } from './components/Controller';

// Resources
export { ArenaConfig, DEFAULT_ARENA_CONFIG } from './resources/ArenaConfig';
export type { ArenaOptions, PaddleSetup } from './resources/ArenaConfig';
export { MatchState } from './resources/MatchState';
export type { Phase, MatchSnapshot } from './resources/MatchState';
export { SimClock } from './resources/SimClock';
export { Input, InputState, anyHeld } from './resources/Input';
export type { InputSource, InputAction } from './resources/Input';

// Particles
export { ParticleStorage } from './particles/ParticleStorage';
export type { Particle, ParticleBurst, ParticleView } from './particles/ParticleStorage';
export { WHITE, BLACK, RED, BLUE } from './particles/Color';
export type { Color } from './particles/Color';

// Events
export * from './events';

// Systems
export { IntegrateTransformsSystem } from './systems/IntegrateTransformsSystem';
export { PaddleControlSystem } from './systems/PaddleControlSystem';
export { CollisionResolveSystem } from './systems/CollisionResolveSystem';
export { MatchPhaseSystem } from './systems/MatchPhaseSystem';
export { AmbientDustSystem, ParticleAdvanceSystem, seedAmbientDust } from './systems/ParticleSystems';

// Match
export { Match, createMatchScheduler } from './game/Match';
export type { MatchOptions } from './game/Match';
