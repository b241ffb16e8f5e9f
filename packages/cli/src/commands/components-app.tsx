import React from 'react';
import { assetPlan, describeSource, runComponents } from '@packwright/core';
import type { ComponentDefinition, ComponentsOptions } from '@packwright/core';
import { DataTable } from '../ui/components/data-table.js';
import { renderPipeline } from '../ui/pipeline-app.js';

function ComponentTable({ components }: { components: ComponentDefinition[] }): React.ReactElement {
  const rows = components.map((c) => {
    const steps = assetPlan(c).flatMap((part) => part.processingSteps.map((s) => s.action));
    return {
      id: c.id,
      name: c.name,
      category: c.category,
      version: c.resolvedVersion ?? '',
      source: describeSource(c.source),
      steps: steps.length > 0 ? steps : '(extract all)',
    };
  });
  return <DataTable rows={rows} />;
}

export async function runComponentsApp(options: ComponentsOptions): Promise<void> {
  await renderPipeline(
    (reporter) => runComponents(options, reporter),
    (components) => <ComponentTable components={components} />
  );
}
