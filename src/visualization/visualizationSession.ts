import type { Logger } from '../diagnostics/logger';
import { isNetworkVisualizable, parseExtAddress, EXT_ADDRESS_PROPERTY, type MeshDevice, type VisualizableMeshDevice } from '../device/meshDevice';

export interface VisualizationSession {
	setTestTitle(title: string): void;
	setReplaySpeed(speed: number): void;
	addNode(device: VisualizableMeshDevice): void;
	removeNode(device: VisualizableMeshDevice): void;
	updateExtAddress(device: VisualizableMeshDevice, extAddress: bigint): void;
	unsubscribeFromAllNodes(): void;
}

export type VisualizationSessionFactory = (host: string, logger: Logger) => VisualizationSession;

/**
 * Front for the optional visualization host. Every call is a no-op while no
 * session is attached, and non-visualizable devices are ignored.
 */
export class VisualizationBridge {
	private session: VisualizationSession | undefined;

	public get enabled(): boolean {
		return this.session !== undefined;
	}

	public attach(session: VisualizationSession): void {
		this.session = session;
	}

	public setTestTitle(title: string): void {
		this.session?.setTestTitle(title);
	}

	public setReplaySpeed(speed: number): void {
		this.session?.setReplaySpeed(speed);
	}

	public addDevice(device: MeshDevice): void {
		if (this.session && isNetworkVisualizable(device)) {
			this.session.addNode(device);
		}
	}

	public removeDevice(device: MeshDevice): void {
		if (this.session && isNetworkVisualizable(device)) {
			this.session.removeNode(device);
		}
	}

	public reportExtAddress(device: MeshDevice): void {
		if (this.session && isNetworkVisualizable(device)) {
			this.session.updateExtAddress(device, parseExtAddress(device.get(EXT_ADDRESS_PROPERTY)));
		}
	}

	/** Unsubscribes from every node, clears the title and detaches the session. */
	public close(): void {
		if (!this.session) {
			return;
		}
		this.session.unsubscribeFromAllNodes();
		this.session.setTestTitle('');
		this.session = undefined;
	}
}
