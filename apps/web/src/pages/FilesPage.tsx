import { useCallback, useState } from 'react'
import { useNavigate } from 'react-router-dom'

import { FileTree } from '../components/FileTree'
import { useWorkbench } from '../layout/workbenchContext'
import { postNotice } from '../lib/appEvents'
import { buildFileTree, fileEntriesFromList, type FileTree as FileTreeModel } from '../lib/fileTree'
import { logSessionEvent } from '../lib/sessionLogging'
import { loadMatrixFile, loadTableFile, resetMatrixFolder, resetTableFolder } from '../lib/workbench'

type Target = '2d' | '1d'

const targetText: Record<Target, { heading: string; browse: string; empty: string }> = {
  '2d': { heading: 'Load Folder: 2D Plot', browse: 'Browse 2D Root', empty: 'No 2D folder selected' },
  '1d': { heading: 'Load Folder: 1D Plot', browse: 'Browse 1D Root', empty: 'No 1D folder selected' },
}

function FolderSection({ target }: { target: Target }) {
  const navigate = useNavigate()
  const { navigator, configurator } = useWorkbench()
  const [tree, setTree] = useState<FileTreeModel | null>(null)
  const [activePath, setActivePath] = useState<string | null>(null)
  const [busy, setBusy] = useState(false)
  const text = targetText[target]

  // React has no typed prop for directory pickers.
  const onInputRef = useCallback((el: HTMLInputElement | null) => {
    if (!el) return
    el.setAttribute('webkitdirectory', '')
    el.setAttribute('directory', '')
  }, [])

  function onPickFolder(files: FileList | null) {
    if (!files || !files.length) return
    const next = buildFileTree(fileEntriesFromList(files))
    const folderName = next.rootName || (files.length === 1 ? files[0].name : `${files.length} files`)
    setTree({ ...next, rootName: folderName })
    setActivePath(null)
    if (target === '2d') resetMatrixFolder(navigator, folderName)
    else resetTableFolder(configurator, folderName)
  }

  async function onSelectFile(path: string, file: File) {
    setActivePath(path)
    setBusy(true)
    try {
      const ok =
        target === '2d'
          ? await loadMatrixFile(file, navigator, postNotice)
          : await loadTableFile(file, configurator, postNotice)
      if (ok) navigate(target === '2d' ? '/2d' : '/1d')
    } finally {
      setBusy(false)
    }
  }

  return (
    <div style={{ display: 'grid', gap: '0.5rem' }}>
      <h2 style={{ fontSize: '1rem', margin: 0 }}>{text.heading}</h2>
      <div style={{ display: 'flex', gap: '0.5rem' }}>
        <input
          readOnly
          aria-label={`${target.toUpperCase()} folder`}
          value={tree?.rootName ?? text.empty}
          style={{ flex: 1, minWidth: 0 }}
        />
        <label
          style={{
            border: '1px solid var(--border)',
            padding: '0.125rem 0.5rem',
            cursor: 'pointer',
            whiteSpace: 'nowrap',
          }}
        >
          {text.browse}
          <input
            ref={onInputRef}
            type="file"
            multiple
            aria-label={text.browse}
            onChange={(e) => onPickFolder(e.target.files)}
            style={{ display: 'none' }}
          />
        </label>
      </div>
      {busy ? <p style={{ margin: 0 }}>Loading…</p> : null}
      {tree ? (
        <FileTree
          nodes={tree.nodes}
          label={`${target.toUpperCase()} files`}
          activePath={activePath}
          onSelectDirectory={(path) => {
            logSessionEvent({ type: 'directory.selected', message: path, payload: { target } })
          }}
          onSelectFile={(node) => {
            void onSelectFile(node.path, node.file)
          }}
        />
      ) : null}
    </div>
  )
}

export function FilesPage() {
  return (
    <section style={{ display: 'grid', gap: '1rem' }}>
      <h1 style={{ margin: 0 }}>Files</h1>
      <FolderSection target="2d" />
      <FolderSection target="1d" />
    </section>
  )
}
