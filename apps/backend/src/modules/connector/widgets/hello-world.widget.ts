import type { IWidgetDescriptor, ResolvedParameters } from '@terminal-connector/types';

function greeting(params: ResolvedParameters): { content: string } {
    const name = params.name;
    const suffix = name && name.type === 'text' ? ` ${name.value}` : '';
    return { content: `# Hello World${suffix}` };
}

export const helloWorldWidget: IWidgetDescriptor = {
    id: 'hello_world',
    name: 'Hello World',
    description: 'Markdown greeting',
    category: 'Examples',
    type: 'markdown',
    gridData: { w: 12, h: 4 },
    params: [
        {
            name: 'name',
            label: 'Name',
            type: 'text',
            description: 'Name to greet',
            required: false
        }
    ],
    columns: [{ field: 'content', headerName: 'Content', type: 'text' }],
    source: { kind: 'local', produce: greeting }
};
