import {
  EC2Client,
  DescribeInstancesCommand,
  StopInstancesCommand,
} from '@aws-sdk/client-ec2'
import type { Filter, Instance } from '@aws-sdk/client-ec2'
import type {
  ComputeBackend,
  ComputeInstance,
  InstanceState,
  InstanceTagFilter,
} from './types'

const KNOWN_STATES: readonly InstanceState[] = [
  'pending',
  'running',
  'stopping',
  'stopped',
  'shutting-down',
  'terminated',
]

function toInstanceState(name: string | undefined): InstanceState {
  const match = KNOWN_STATES.find((s) => s === name)
  // An unknown state is never stop-eligible.
  return match ?? 'pending'
}

function toComputeInstance(instance: Instance): ComputeInstance | undefined {
  if (!instance.InstanceId || !instance.LaunchTime) {
    return undefined
  }
  const tags: Record<string, string> = {}
  for (const tag of instance.Tags ?? []) {
    if (tag.Key !== undefined) {
      tags[tag.Key] = tag.Value ?? ''
    }
  }
  return {
    instanceId: instance.InstanceId,
    state: toInstanceState(instance.State?.Name),
    launchTime: new Date(instance.LaunchTime),
    tags,
  }
}

export function createComputeBackend(
  client: EC2Client = new EC2Client({}),
): ComputeBackend {
  return {
    async listInstances(filter?: InstanceTagFilter): Promise<ComputeInstance[]> {
      const filters: Filter[] = []
      if (filter) {
        filters.push({ Name: `tag:${filter.key}`, Values: [filter.value] })
      }

      const instances: ComputeInstance[] = []
      let nextToken: string | undefined

      do {
        const result = await client.send(
          new DescribeInstancesCommand({
            ...(filters.length > 0 ? { Filters: filters } : {}),
            NextToken: nextToken,
          }),
        )

        for (const reservation of result.Reservations ?? []) {
          for (const raw of reservation.Instances ?? []) {
            const instance = toComputeInstance(raw)
            if (instance) {
              instances.push(instance)
            }
          }
        }

        nextToken = result.NextToken
      } while (nextToken)

      return instances
    },

    async stopInstance(instanceId: string): Promise<void> {
      await client.send(new StopInstancesCommand({ InstanceIds: [instanceId] }))
    },
  }
}
