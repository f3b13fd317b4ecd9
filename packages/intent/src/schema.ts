import { z } from 'zod'
import { parseInterfaceAddress, parseIpv4Prefix } from '@intentcfg/netaddr'
import type { Connection } from './model.js'

export const PrefixSchema = z.string().transform((text, ctx) => {
  const prefix = parseIpv4Prefix(text)
  if (!prefix) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Invalid IPv4 prefix: ${text}` })
    return z.NEVER
  }
  return prefix
})

export const InterfaceAddressSchema = z.string().transform((text, ctx) => {
  const address = parseInterfaceAddress(text)
  if (!address) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Invalid IPv4 address: ${text}` })
    return z.NEVER
  }
  return address
})

export const HostnameSchema = z
  .string()
  .trim()
  .min(1)
  .regex(/^\S+$/, 'Hostname must not contain whitespace')

export const AsNumberSchema = z.number().int().positive()

export const RelationshipSchema = z.enum(['peer', 'provider', 'client'])

const ConnectionObjectSchema = z.object({
  AS_number: AsNumberSchema,
  relationship: RelationshipSchema,
  links: z.record(HostnameSchema, PrefixSchema).default({}),
})

const ConnectionTupleSchema = z.tuple([
  AsNumberSchema,
  RelationshipSchema,
  z.record(HostnameSchema, PrefixSchema),
])

/**
 * A `connected_AS` entry, written either as a named record or as the
 * positional `[AS_number, relationship, { hostname: prefix }]` triple.
 */
export const ConnectionSchema = z
  .union([ConnectionObjectSchema, ConnectionTupleSchema])
  .transform((value): Connection => {
    if (Array.isArray(value)) {
      const [asNumber, relationship, links] = value
      return { asNumber, relationship, linkPrefixes: new Map(Object.entries(links)) }
    }
    return {
      asNumber: value.AS_number,
      relationship: value.relationship,
      linkPrefixes: new Map(Object.entries(value.links)),
    }
  })

export const AutonomousSystemSchema = z.object({
  AS_number: AsNumberSchema,
  ipv4_prefix: PrefixSchema,
  ipv4_loopback_prefix: PrefixSchema,
  internal_routing: z.enum(['OSPF', 'RIP']),
  routers: z.array(HostnameSchema),
  LDP_activation: z.boolean().default(false),
  connected_AS: z.array(ConnectionSchema).default([]),
})

export const LinkSchema = z.object({
  hostname: HostnameSchema,
  interface: z.string().trim().min(1).optional(),
  ipv4_address: InterfaceAddressSchema.optional(),
  ospf_cost: z.number().int().min(1).max(65535).optional(),
})

/** A single VPN family number; a one-element list is accepted for the same thing. */
export const VpnFamilySchema = z
  .union([z.number().int().positive(), z.array(z.number().int().positive())])
  .transform((value, ctx): number | undefined => {
    if (!Array.isArray(value)) return value
    if (value.length > 1) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: 'Only one VPN family per router is supported',
      })
      return z.NEVER
    }
    return value.length === 1 ? value[0] : undefined
  })

export const RouterSchema = z.object({
  hostname: HostnameSchema,
  AS_number: AsNumberSchema,
  links: z.array(LinkSchema).default([]),
  ipv4_loopback_address: InterfaceAddressSchema.optional(),
  position: z.object({ x: z.number(), y: z.number() }).default({ x: 0, y: 0 }),
  VPN_family: VpnFamilySchema.optional(),
})

export const IntentFileSchema = z.object({
  ip_version: z.literal(4, {
    errorMap: () => ({ message: 'Only ip_version 4 is supported' }),
  }),
  Les_AS: z.array(AutonomousSystemSchema).min(1),
  Les_routeurs: z.array(RouterSchema),
})

export type IntentFile = z.infer<typeof IntentFileSchema>
export type AutonomousSystemRecord = z.infer<typeof AutonomousSystemSchema>
export type RouterRecord = z.infer<typeof RouterSchema>
/** Shape of an intent document before defaults and normalisation. */
export type IntentInput = z.input<typeof IntentFileSchema>
