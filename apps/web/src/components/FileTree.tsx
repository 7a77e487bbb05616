import { useState } from 'react'

import type { FileTreeNode } from '../lib/fileTree'

type TreeNodeProps = {
  label: string
  depth: number
  isExpanded?: boolean
  isActive?: boolean
  onClick?: () => void
}

function TreeNode({ label, depth, isExpanded, isActive, onClick }: TreeNodeProps) {
  return (
    <button
      type="button"
      onClick={onClick}
      aria-expanded={isExpanded}
      style={{
        display: 'flex',
        width: '100%',
        alignItems: 'center',
        gap: '0.25rem',
        padding: '0.125rem 0.5rem',
        paddingLeft: `${depth * 18 + 8}px`,
        border: 'none',
        background: isActive ? 'var(--accent)' : 'transparent',
        color: 'inherit',
        cursor: 'pointer',
        fontSize: '0.85rem',
        textAlign: 'left',
      }}
    >
      <span style={{ width: '0.9rem', flexShrink: 0 }}>{isExpanded === undefined ? '' : isExpanded ? '▾' : '▸'}</span>
      <span style={{ overflow: 'hidden', textOverflow: 'ellipsis', whiteSpace: 'nowrap' }}>{label}</span>
    </button>
  )
}

export function FileTree({
  nodes,
  label,
  activePath,
  onSelectDirectory,
  onSelectFile,
}: {
  nodes: FileTreeNode[]
  label: string
  activePath: string | null
  onSelectDirectory?: (path: string) => void
  onSelectFile: (node: Extract<FileTreeNode, { kind: 'file' }>) => void
}) {
  const [expanded, setExpanded] = useState<Set<string>>(() => new Set())

  function toggle(path: string) {
    setExpanded((prev) => {
      const next = new Set(prev)
      if (next.has(path)) next.delete(path)
      else next.add(path)
      return next
    })
  }

  function renderNodes(items: FileTreeNode[], depth: number): JSX.Element[] {
    return items.map((node) => {
      if (node.kind === 'file') {
        return (
          <li key={node.path}>
            <TreeNode
              label={node.name}
              depth={depth}
              isActive={node.path === activePath}
              onClick={() => onSelectFile(node)}
            />
          </li>
        )
      }

      const isExpanded = expanded.has(node.path)
      return (
        <li key={node.path}>
          <TreeNode
            label={node.name}
            depth={depth}
            isExpanded={isExpanded}
            onClick={() => {
              toggle(node.path)
              onSelectDirectory?.(node.path)
            }}
          />
          {isExpanded ? <ul style={{ listStyle: 'none', margin: 0, padding: 0 }}>{renderNodes(node.children, depth + 1)}</ul> : null}
        </li>
      )
    })
  }

  if (!nodes.length) return <p style={{ fontSize: '0.85rem', opacity: 0.7 }}>No files.</p>

  return (
    <ul aria-label={label} style={{ listStyle: 'none', margin: 0, padding: 0 }}>
      {renderNodes(nodes, 0)}
    </ul>
  )
}
