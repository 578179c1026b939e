import { useEffect, useState } from 'preact/hooks';
import type { DiskMapSession, DiskMapState } from '../../core/features/diskMap/diskMapSession';

/**
 * Mirrors a session's state into component state.
 */
export function useDiskMapSession(session: DiskMapSession): DiskMapState {
	const [state, setState] = useState<DiskMapState>(() => session.getState());

	useEffect(() => {
		const handleChange = (next: DiskMapState) => setState(next);
		session.on('change', handleChange);
		// Pick up anything that changed between render and subscription.
		setState(session.getState());
		return () => {
			session.off('change', handleChange);
		};
	}, [session]);

	return state;
}
