import { PortId, ProbeResult } from '../../types/monitor';

export interface ProbeCapability {
  readonly name: string;
  probe(port: PortId): Promise<ProbeResult>;
}
