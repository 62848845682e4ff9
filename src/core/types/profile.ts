/**
 * Core types for appliance profiles.
 * Built once from a validated JSON document and frozen afterwards.
 */
import type { DataType } from '../../modules/decoder/dataTypes'

// ============================================================================
// Byte Patterns
// ============================================================================

export interface BytePattern {
  source: string             // "^7547", "*", "08"
  anchored: boolean          // leading "^": payload must start with bytes
  bytes: (number | null)[]   // null = wildcard byte
}

export interface PatternSpec {
  src: BytePattern
  dst: BytePattern
  pbsb: number | null        // 0x2000; null = any command
  data: BytePattern | null   // null = any payload
}

// ============================================================================
// Messages
// ============================================================================

export interface FieldMapping {
  fieldName: string          // "boiler_pressure"
  offset: number             // relative to payload start
  dataType: DataType         // "u16le"
  factor: number             // 0.1
  unit: string               // "bar"
}

export interface MessageDefinition {
  comment: string
  publishFormat: string      // "ebusd/<circuit_name>/<field_name>"
  requestMatch: PatternSpec
  responseMatch: PatternSpec | null
  requestMap: FieldMapping[] | null
  responseMap: FieldMapping[] | null
}

export interface Circuit {
  name: string               // "boiler"
  messages: MessageDefinition[]
}

// ============================================================================
// Presence & Autodiscovery
// ============================================================================

export interface PresenceRule {
  valid: boolean
  request: PatternSpec
  response: PatternSpec
}

export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue }

export interface AutodiscoveryConfig {
  enabled: boolean
  topic: string              // "homeassistant"
  payload: { [key: string]: JsonValue }
}

// ============================================================================
// Appliance Profile
// ============================================================================

export interface ApplianceProfile {
  appliance: string
  bus: string
  origin: string             // file the profile was loaded from
  presence: PresenceRule
  autodiscovery: AutodiscoveryConfig | null
  circuits: Circuit[]
}
