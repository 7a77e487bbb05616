export type FileEntry = {
  /** Path relative to the chosen folder's parent, e.g. `data/run1/a.csv`. */
  relativePath: string
  file: File
}

export type FileTreeNode =
  | { kind: 'directory'; name: string; path: string; children: FileTreeNode[] }
  | { kind: 'file'; name: string; path: string; file: File }

export type FileTree = {
  rootName: string
  nodes: FileTreeNode[]
}

type DirectoryNode = Extract<FileTreeNode, { kind: 'directory' }>

export function fileEntriesFromList(list: FileList | readonly File[]): FileEntry[] {
  return Array.from(list).map((file) => ({ relativePath: file.webkitRelativePath || file.name, file }))
}

function sortNodes(nodes: FileTreeNode[]) {
  nodes.sort((a, b) => {
    if (a.kind !== b.kind) return a.kind === 'directory' ? -1 : 1
    return a.name.localeCompare(b.name)
  })
  for (const node of nodes) {
    if (node.kind === 'directory') sortNodes(node.children)
  }
}

/**
 * Builds a nested tree, directories first. The first path segment shared by
 * every entry is the chosen folder and becomes `rootName`.
 */
export function buildFileTree(entries: readonly FileEntry[]): FileTree {
  const split = entries.map((e) => ({ parts: e.relativePath.split('/').filter(Boolean), file: e.file }))
  const first = split[0]?.parts[0] ?? ''
  const sharedRoot = split.length > 0 && split.every((s) => s.parts.length > 1 && s.parts[0] === first)
  const rootName = sharedRoot ? first : ''

  const root: DirectoryNode = { kind: 'directory', name: rootName, path: rootName, children: [] }
  for (const { parts, file } of split) {
    const segments = sharedRoot ? parts.slice(1) : parts
    let dir = root
    for (let i = 0; i < segments.length - 1; i += 1) {
      const name = segments[i]
      const path = dir.path ? `${dir.path}/${name}` : name
      let child = dir.children.find((c): c is DirectoryNode => c.kind === 'directory' && c.name === name)
      if (!child) {
        child = { kind: 'directory', name, path, children: [] }
        dir.children.push(child)
      }
      dir = child
    }
    const name = segments[segments.length - 1]
    if (!name) continue
    dir.children.push({ kind: 'file', name, path: dir.path ? `${dir.path}/${name}` : name, file })
  }

  sortNodes(root.children)
  return { rootName, nodes: root.children }
}
