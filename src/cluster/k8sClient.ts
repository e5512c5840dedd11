import * as k8s from '@kubernetes/client-node';
import { getLogger } from '@fluidware-it/saddlebag';

export interface KubeClients {
  contextName: string;
  coreApi: k8s.CoreV1Api;
  versionApi: k8s.VersionApi;
}

// Loads in-cluster service account credentials, KUBECONFIG or ~/.kube/config,
// whichever is found first, then switches to the requested context.
export function loadKubeConfig(context?: string): k8s.KubeConfig {
  const kc = new k8s.KubeConfig();
  try {
    kc.loadFromDefault();
  } catch (error: unknown) {
    const message = error instanceof Error ? error.message : String(error);
    getLogger().error(`Failed to load Kubernetes configuration: ${message}`);
    throw new Error(`Kubernetes configuration error: ${message}`);
  }

  if (context) {
    const available = kc.getContexts().map(c => c.name);
    if (!available.includes(context)) {
      throw new Error(`Context "${context}" not found. Available contexts: ${available.join(', ')}`);
    }
    kc.setCurrentContext(context);
  }

  getLogger().info(`K8s context loaded: ${kc.getCurrentContext()}`);
  return kc;
}

export function createKubeClients(context?: string): KubeClients {
  const kc = loadKubeConfig(context);
  return {
    contextName: kc.getCurrentContext(),
    coreApi: kc.makeApiClient(k8s.CoreV1Api),
    versionApi: kc.makeApiClient(k8s.VersionApi)
  };
}
