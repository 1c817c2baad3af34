import { AnalyzerRegistry } from './AnalyzerRegistry';
import { ClrStackAnalyzer } from './ClrStackAnalyzer';
import { DumpHeapAnalyzer } from './DumpHeapAnalyzer';
import { DumpObjAnalyzer } from './DumpObjAnalyzer';
import { DumpStackObjectsAnalyzer } from './DumpStackObjectsAnalyzer';
import { EEHeapAnalyzer } from './EEHeapAnalyzer';
import { FinalizeQueueAnalyzer } from './FinalizeQueueAnalyzer';
import { GCHandlesAnalyzer } from './GCHandlesAnalyzer';
import { GCRootAnalyzer } from './GCRootAnalyzer';
import { HandleAnalyzer } from './HandleAnalyzer';
import { SyncBlockAnalyzer } from './SyncBlockAnalyzer';
import { ThreadPoolAnalyzer } from './ThreadPoolAnalyzer';
import { ThreadsAnalyzer } from './ThreadsAnalyzer';

export * from './AnalyzerRegistry';
export * from './BaseAnalyzer';

/** One registry per session; the registry sorts by tier itself. */
export function createDefaultRegistry(): AnalyzerRegistry {
  const registry = new AnalyzerRegistry();
  registry.register(new ClrStackAnalyzer());
  registry.register(new DumpHeapAnalyzer());
  registry.register(new GCHandlesAnalyzer());
  registry.register(new GCRootAnalyzer());
  registry.register(new ThreadsAnalyzer());
  registry.register(new ThreadPoolAnalyzer());
  registry.register(new SyncBlockAnalyzer());
  registry.register(new FinalizeQueueAnalyzer());
  registry.register(new EEHeapAnalyzer());
  registry.register(new DumpObjAnalyzer());
  registry.register(new DumpStackObjectsAnalyzer());
  registry.register(new HandleAnalyzer());
  return registry;
}
