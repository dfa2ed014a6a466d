import type { VisualizableMeshDevice } from '../device/meshDevice';
import type { VisualizationSession, VisualizationSessionFactory } from '../visualization/visualizationSession';

/** Records every call as a readable event string. */
export class FakeVisualizationSession implements VisualizationSession {
	public readonly events: string[] = [];

	public constructor(public readonly host: string) {}

	public setTestTitle(title: string): void {
		this.events.push(`title ${title}`);
	}

	public setReplaySpeed(speed: number): void {
		this.events.push(`speed ${speed}`);
	}

	public addNode(device: VisualizableMeshDevice): void {
		this.events.push(`add ${device.visualizationNodeId}`);
	}

	public removeNode(device: VisualizableMeshDevice): void {
		this.events.push(`remove ${device.visualizationNodeId}`);
	}

	public updateExtAddress(device: VisualizableMeshDevice, extAddress: bigint): void {
		this.events.push(`extaddr ${device.visualizationNodeId} ${extAddress.toString(16)}`);
	}

	public unsubscribeFromAllNodes(): void {
		this.events.push('unsubscribe');
	}
}

export function createFakeVisualizationFactory(sessions: FakeVisualizationSession[] = []): VisualizationSessionFactory {
	return (host) => {
		const session = new FakeVisualizationSession(host);
		sessions.push(session);
		return session;
	};
}
